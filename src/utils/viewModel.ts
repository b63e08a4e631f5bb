import {
  filterByYear,
  rankByEmissions,
  seriesByCountry,
  type CountrySeries,
  type Dataset,
  type EmissionRecord,
  type Selection
} from './emissions'
import { EmptySelectionError } from './errors'

export interface MapView {
  mode: 'map'
  year: number
  records: EmissionRecord[]
}

export interface LineView {
  mode: 'line'
  year: number
  yearRange: readonly [number, number]
  countries: readonly string[]
  series: CountrySeries[]
}

export interface BarView {
  mode: 'bar'
  year: number
  countries: readonly string[]
  records: EmissionRecord[]
}

export type ViewModel = MapView | LineView | BarView

const requireRecords = (dataset: Dataset, year: number): EmissionRecord[] => {
  const records = filterByYear(dataset, year)
  if (records.length === 0) throw new EmptySelectionError(year)
  return records
}

/**
 * Derives what a view mode draws for the selected year. Map and bar views
 * throw EmptySelectionError when the year has no records; the line view
 * always spans the whole dataset.
 */
export const deriveView = (dataset: Dataset, selection: Selection): ViewModel => {
  const { year, viewMode } = selection

  switch (viewMode) {
    case 'map':
      return { mode: 'map', year, records: requireRecords(dataset, year) }
    case 'line':
      return {
        mode: 'line',
        year,
        yearRange: dataset.yearRange,
        countries: dataset.countries,
        series: seriesByCountry(dataset)
      }
    case 'bar':
      return {
        mode: 'bar',
        year,
        countries: dataset.countries,
        records: rankByEmissions(requireRecords(dataset, year))
      }
  }
}
