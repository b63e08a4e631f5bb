import { describe, it, expect } from 'vitest'
import { render, screen } from '@testing-library/react'
import ViewRenderer from '../ViewRenderer'
import { parseEmissionsCsv, type Selection } from '../../utils/emissions'
import { SAMPLE_CSV } from '../../test/fixtures'

const dataset = parseEmissionsCsv(SAMPLE_CSV)

const renderView = (selection: Selection) =>
  render(<ViewRenderer dataset={dataset} selection={selection} atlasUrl={null} />)

const textsOf = (container: HTMLElement, selector: string): Array<string | null> =>
  Array.from(container.querySelectorAll(selector)).map(node => node.textContent)

describe('ViewRenderer', () => {
  it('draws one bubble per country on the map', () => {
    const { container } = renderView({ year: 2020, viewMode: 'map' })

    expect(screen.getByRole('heading', { name: 'CO₂ Emissions per Capita — 2020' })).toBeTruthy()
    expect(textsOf(container, 'circle.emission-bubble title')).toEqual([
      'Vietnam: 2.10 t per capita',
      'Indonesia: 1.80 t per capita'
    ])
    expect(container.querySelectorAll('path.country-outline')).toHaveLength(0)
    expect(
      screen.getByText('▶️ Use the slider on the sidebar to simulate a time-lapse effect year by year.')
    ).toBeTruthy()
  })

  it('ranks bars from highest to lowest', () => {
    const { container } = renderView({ year: 2020, viewMode: 'bar' })

    expect(screen.getByRole('heading', { name: 'CO₂ Emission Comparison — 2020' })).toBeTruthy()
    expect(
      Array.from(container.querySelectorAll('g.bar')).map(bar => bar.getAttribute('data-country'))
    ).toEqual(['Vietnam', 'Indonesia'])
    expect(textsOf(container, 'text.bar-value')).toEqual(['2.10', '1.80'])
  })

  it('draws a line per country with a marker at the selected year', () => {
    const { container } = renderView({ year: 2019, viewMode: 'line' })

    expect(screen.getByRole('heading', { name: 'Historical CO₂ Emissions Trends' })).toBeTruthy()
    expect(container.querySelectorAll('path.series-line')).toHaveLength(2)
    expect(textsOf(container, '.legend-item text')).toEqual(['Indonesia', 'Vietnam'])

    const marker = container.querySelector('line.focus-year-line')
    expect(marker?.getAttribute('stroke')).toBe('red')
    expect(marker?.getAttribute('stroke-dasharray')).toBe('6 4')

    // Vietnam has no 2019 value
    expect(textsOf(container, '.focus-dots title')).toEqual(['Indonesia (2019): 2.00 t per capita'])
  })

  it('shows an empty state for a year without data', () => {
    const { container } = renderView({ year: 1990, viewMode: 'bar' })

    expect(screen.getByRole('status').textContent).toBe('No emissions data for 1990.')
    expect(container.querySelector('svg')).toBeNull()
  })
})
