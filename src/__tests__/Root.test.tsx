import { beforeEach, describe, it, expect } from 'vitest'
import { render, screen } from '@testing-library/react'
import Root from '../Root'
import { readDashboardConfig } from '../config/dashboard'
import { resetDatasetCache } from '../utils/datasetCache'
import type { CsvFetcher } from '../utils/emissions'
import { SAMPLE_CSV, csvResponse } from '../test/fixtures'

const sampleFetcher: CsvFetcher = async () => csvResponse(SAMPLE_CSV)

describe('Root', () => {
  beforeEach(() => {
    resetDatasetCache()
  })

  it('shows an invalid configuration inline instead of mounting the dashboard', () => {
    render(<Root configResult={readDashboardConfig({ VITE_DEFAULT_YEAR: 'soon' })} fetcher={sampleFetcher} />)

    const alert = screen.getByRole('alert')
    expect(alert.querySelector('h2')?.textContent).toBe('Configuration error')
    expect(alert.querySelector('p')?.textContent).toMatch(/^Invalid dashboard configuration: VITE_DEFAULT_YEAR: /)
    expect(screen.queryByText('Loading emissions data...')).toBeNull()
  })

  it('renders the dashboard for a valid configuration', async () => {
    render(<Root configResult={readDashboardConfig({ VITE_ATLAS_URL: '' })} fetcher={sampleFetcher} />)

    expect(await screen.findByText('Select Visualization Type')).toBeTruthy()
    expect(screen.queryByRole('alert')).toBeNull()
  })
})
