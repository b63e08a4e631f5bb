export type DataLoadFailure = 'missing-file' | 'bad-schema' | 'bad-value' | 'duplicate'

interface DataLoadErrorOptions {
  row?: number
  column?: string
  cause?: unknown
}

/**
 * Raised when the emissions file cannot be fetched or does not describe a
 * valid dataset. `row` is the 1-based data row (header excluded).
 */
export class DataLoadError extends Error {
  readonly reason: DataLoadFailure
  readonly row: number | null
  readonly column: string | null

  constructor(reason: DataLoadFailure, message: string, options: DataLoadErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'DataLoadError'
    this.reason = reason
    this.row = options.row ?? null
    this.column = options.column ?? null
  }
}

/** No records for the selected year. Shown as an empty state, never fatal. */
export class EmptySelectionError extends Error {
  readonly year: number

  constructor(year: number) {
    super(`No emissions data for ${year}.`)
    this.name = 'EmptySelectionError'
    this.year = year
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
