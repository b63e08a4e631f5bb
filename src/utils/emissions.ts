import { getLogger } from '@logtape/logtape'
import type { DSVRowString } from 'd3'
import { z } from 'zod'
import { ASEAN_CENTROIDS, UNKNOWN_COORDINATES } from '../constants/asean'
import { parseCsv, toNumber } from './csv'
import { DataLoadError, describeError } from './errors'

const logger = getLogger(['dashboard', 'data'])

export interface EmissionRecord {
  readonly country: string
  readonly year: number
  readonly co2PerCapita: number
  readonly latitude: number
  readonly longitude: number
}

export interface Dataset {
  readonly records: readonly EmissionRecord[]
  readonly years: readonly number[]
  readonly countries: readonly string[]
  readonly yearRange: readonly [number, number]
}

export interface EmissionPoint {
  year: number
  value: number
}

export interface CountrySeries {
  country: string
  points: EmissionPoint[]
  valueByYear: Map<number, number>
}

export type ViewMode = 'map' | 'line' | 'bar'

export const VIEW_MODES: readonly ViewMode[] = ['map', 'line', 'bar']

export interface Selection {
  year: number
  viewMode: ViewMode
}

type Field = 'country' | 'year' | 'co2PerCapita' | 'latitude' | 'longitude'

export interface ColumnMap {
  country: string
  year: string
  co2PerCapita: string
  latitude: string | null
  longitude: string | null
}

// Header names are compared after normalizeColumnName
const COLUMN_ALIASES: Record<Field, readonly string[]> = {
  country: ['country', 'entity', 'countryname', 'nation'],
  year: ['year'],
  co2PerCapita: [
    'co2percapita',
    'co2',
    'co2emissionspercapita',
    'co2emissionpercapita',
    'annualco2emissionspercapita'
  ],
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng', 'long']
}

const FIELD_LABELS: Record<Field, string> = {
  country: 'country',
  year: 'year',
  co2PerCapita: 'co2_per_capita',
  latitude: 'latitude',
  longitude: 'longitude'
}

const REQUIRED_FIELDS = ['country', 'year', 'co2PerCapita'] as const

export const normalizeColumnName = (name: string): string =>
  name
    .trim()
    .toLowerCase()
    .replace(/₂/g, '2')
    .replace(/[^a-z0-9]/g, '')

export const resolveColumns = (columns: readonly string[]): ColumnMap => {
  const find = (field: Field): string | null =>
    columns.find(column => COLUMN_ALIASES[field].includes(normalizeColumnName(column))) ?? null

  const country = find('country')
  const year = find('year')
  const co2PerCapita = find('co2PerCapita')

  if (country === null || year === null || co2PerCapita === null) {
    const found: Record<(typeof REQUIRED_FIELDS)[number], string | null> = { country, year, co2PerCapita }
    const missing = REQUIRED_FIELDS.filter(field => found[field] === null).map(field => FIELD_LABELS[field])
    throw new DataLoadError('bad-schema', `Missing required column(s): ${missing.join(', ')}`)
  }

  // Coordinates are only taken from the file when both columns are present
  const latitude = find('latitude')
  const longitude = find('longitude')
  const hasCoordinates = latitude !== null && longitude !== null

  return {
    country,
    year,
    co2PerCapita,
    latitude: hasCoordinates ? latitude : null,
    longitude: hasCoordinates ? longitude : null
  }
}

const numericCell = z.string().transform((value, ctx) => {
  const parsed = toNumber(value)
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a number` })
    return z.NEVER
  }
  return parsed
})

const RowSchema = z.object({
  country: z.string().trim().min(1, 'country name is empty'),
  year: numericCell.pipe(z.number().int('year must be a whole number')),
  co2PerCapita: numericCell.pipe(z.number().nonnegative('CO₂ per capita must not be negative')),
  latitude: numericCell.pipe(z.number().min(-90).max(90)).nullable(),
  longitude: numericCell.pipe(z.number().min(-180).max(180)).nullable()
})

const isField = (value: unknown): value is Field =>
  typeof value === 'string' && value in COLUMN_ALIASES

const readCell = (row: DSVRowString<string>, column: string | null): string | null =>
  column === null ? null : (row[column] ?? '')

const parseRecord = (row: DSVRowString<string>, columns: ColumnMap, rowNumber: number): EmissionRecord => {
  const result = RowSchema.safeParse({
    country: readCell(row, columns.country),
    year: readCell(row, columns.year),
    co2PerCapita: readCell(row, columns.co2PerCapita),
    latitude: readCell(row, columns.latitude),
    longitude: readCell(row, columns.longitude)
  })

  if (!result.success) {
    const issue = result.error.issues[0]
    const pathHead = issue?.path[0]
    const field = isField(pathHead) ? pathHead : null
    const column = field === null ? undefined : (columns[field] ?? FIELD_LABELS[field])
    throw new DataLoadError(
      'bad-value',
      `Row ${rowNumber}${column ? `, column "${column}"` : ''}: ${issue?.message ?? 'invalid value'}`,
      { row: rowNumber, column }
    )
  }

  const { country, year, co2PerCapita, latitude, longitude } = result.data
  const [fallbackLatitude, fallbackLongitude] = ASEAN_CENTROIDS.get(country) ?? UNKNOWN_COORDINATES

  return {
    country,
    year,
    co2PerCapita,
    latitude: latitude ?? fallbackLatitude,
    longitude: longitude ?? fallbackLongitude
  }
}

export const buildDataset = (records: EmissionRecord[]): Dataset => {
  const years = Array.from(new Set(records.map(record => record.year))).sort((a, b) => a - b)
  const countries = Array.from(new Set(records.map(record => record.country))).sort((a, b) => a.localeCompare(b))
  const minYear = years[0] ?? 0
  const maxYear = years[years.length - 1] ?? minYear

  return {
    records: Object.freeze(records.map(record => Object.freeze(record))),
    years,
    countries,
    yearRange: [minYear, maxYear]
  }
}

/**
 * Parses the emissions CSV into a dataset. Rejects empty files, missing
 * columns, malformed cells and repeated (country, year) pairs.
 */
export const parseEmissionsCsv = (text: string): Dataset => {
  const rows = parseCsv(text)
  if (rows.columns.length === 0) {
    throw new DataLoadError('bad-schema', 'The emissions file is empty')
  }

  const columns = resolveColumns(rows.columns)
  if (rows.length === 0) {
    throw new DataLoadError('bad-schema', 'The emissions file has a header but no data rows')
  }

  const seen = new Set<string>()
  const records = rows.map((row, index) => {
    const rowNumber = index + 1
    const record = parseRecord(row, columns, rowNumber)
    const key = `${record.country}::${record.year}`
    if (seen.has(key)) {
      throw new DataLoadError(
        'duplicate',
        `Row ${rowNumber}: ${record.country} already has a value for ${record.year}`,
        { row: rowNumber }
      )
    }
    seen.add(key)
    return record
  })

  return buildDataset(records)
}

export interface CsvResponse {
  ok: boolean
  status: number
  text(): Promise<string>
}

export type CsvFetcher = (url: string) => Promise<CsvResponse>

const fetchText: CsvFetcher = url => fetch(url)

export async function loadEmissions(path: string, fetcher: CsvFetcher = fetchText): Promise<Dataset> {
  let response: CsvResponse
  try {
    response = await fetcher(path)
  } catch (fetchError) {
    throw new DataLoadError('missing-file', `Could not fetch ${path}: ${describeError(fetchError)}`, {
      cause: fetchError
    })
  }

  if (!response.ok) {
    throw new DataLoadError('missing-file', `Failed to load ${path} (${response.status})`)
  }

  const dataset = parseEmissionsCsv(await response.text())
  logger.info('Loaded {count} emission records for {minYear}-{maxYear} from {path}', {
    count: dataset.records.length,
    minYear: dataset.yearRange[0],
    maxYear: dataset.yearRange[1],
    path
  })
  return dataset
}

export const filterByYear = (dataset: Dataset, year: number): EmissionRecord[] =>
  dataset.records.filter(record => record.year === year)

export const rankByEmissions = (records: readonly EmissionRecord[]): EmissionRecord[] =>
  [...records].sort((a, b) => b.co2PerCapita - a.co2PerCapita || a.country.localeCompare(b.country))

export const seriesByCountry = (dataset: Dataset): CountrySeries[] => {
  const builders = new Map<string, EmissionPoint[]>()

  dataset.records.forEach(record => {
    const point = { year: record.year, value: record.co2PerCapita }
    const existing = builders.get(record.country)
    if (existing) {
      existing.push(point)
      return
    }
    builders.set(record.country, [point])
  })

  return Array.from(builders.entries())
    .map(([country, points]) => {
      const sorted = [...points].sort((a, b) => a.year - b.year)
      return {
        country,
        points: sorted,
        valueByYear: new Map(sorted.map(point => [point.year, point.value] as const))
      } satisfies CountrySeries
    })
    .sort((a, b) => a.country.localeCompare(b.country))
}

export const clampYear = (dataset: Dataset, year: number): number => {
  const [minYear, maxYear] = dataset.yearRange
  if (!Number.isFinite(year)) return minYear
  return Math.max(minYear, Math.min(maxYear, Math.trunc(year)))
}

export const defaultYear = (dataset: Dataset, preferred: number): number => clampYear(dataset, preferred)
