import { beforeEach, describe, it, expect, vi } from 'vitest'
import { fireEvent, render, screen } from '@testing-library/react'
import App from '../App'
import type { DashboardConfig } from '../config/dashboard'
import { resetDatasetCache } from '../utils/datasetCache'
import type { CsvFetcher } from '../utils/emissions'
import { SAMPLE_CSV, csvResponse } from '../test/fixtures'

const makeConfig = (overrides: Partial<DashboardConfig> = {}): DashboardConfig => ({
  emissionsCsvUrl: '/app.csv',
  defaultYear: 2020,
  atlasUrl: null,
  timelapseIntervalMs: 500,
  dataSourceNote: 'Test note',
  logLevel: 'info',
  ...overrides
})

const sampleFetcher: CsvFetcher = async () => csvResponse(SAMPLE_CSV)

describe('App', () => {
  beforeEach(() => {
    resetDatasetCache()
  })

  it('opens on the map for the default year', async () => {
    render(<App config={makeConfig()} fetcher={sampleFetcher} />)

    expect(screen.getByText('Loading emissions data...')).toBeTruthy()
    expect(await screen.findByRole('heading', { name: 'CO₂ Emissions per Capita — 2020' })).toBeTruthy()
    expect(screen.getByText('Test note')).toBeTruthy()
  })

  it('clamps the default year to the data', async () => {
    render(<App config={makeConfig({ emissionsCsvUrl: '/clamp.csv', defaultYear: 2035 })} fetcher={sampleFetcher} />)

    expect(await screen.findByRole('heading', { name: 'CO₂ Emissions per Capita — 2020' })).toBeTruthy()
  })

  it('switches view mode and year from the sidebar', async () => {
    const { container } = render(<App config={makeConfig({ emissionsCsvUrl: '/switch.csv' })} fetcher={sampleFetcher} />)
    await screen.findByRole('heading', { name: 'CO₂ Emissions per Capita — 2020' })

    fireEvent.click(screen.getByRole('radio', { name: /Bar Chart/ }))
    expect(screen.getByRole('heading', { name: 'CO₂ Emission Comparison — 2020' })).toBeTruthy()
    expect(container.querySelectorAll('g.bar')).toHaveLength(2)

    fireEvent.change(screen.getByLabelText('Select Year (for time-lapse)'), { target: { value: '2019' } })
    expect(screen.getByRole('heading', { name: 'CO₂ Emission Comparison — 2019' })).toBeTruthy()
    expect(container.querySelectorAll('g.bar')).toHaveLength(1)
  })

  it('shows load failures inline and retries', async () => {
    const fetcher = vi
      .fn<CsvFetcher>()
      .mockResolvedValueOnce(csvResponse('', 404))
      .mockResolvedValueOnce(csvResponse(SAMPLE_CSV))
    render(<App config={makeConfig({ emissionsCsvUrl: '/missing.csv' })} fetcher={fetcher} />)

    const alert = await screen.findByRole('alert')
    expect(alert.textContent).toContain('Error: Failed to load /missing.csv (404)')

    fireEvent.click(screen.getByRole('button', { name: 'Retry' }))

    expect(await screen.findByRole('heading', { name: 'CO₂ Emissions per Capita — 2020' })).toBeTruthy()
  })
})
