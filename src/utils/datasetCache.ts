import { loadEmissions, type CsvFetcher, type Dataset } from './emissions'

// One load per path for the page lifetime; failed loads are dropped so they can be retried
const cache = new Map<string, Promise<Dataset>>()

export function getDataset(path: string, fetcher?: CsvFetcher): Promise<Dataset> {
  const cached = cache.get(path)
  if (cached) return cached

  const pending = loadEmissions(path, fetcher).catch((loadError: unknown) => {
    cache.delete(path)
    throw loadError
  })
  cache.set(path, pending)
  return pending
}

export const resetDatasetCache = (): void => {
  cache.clear()
}
