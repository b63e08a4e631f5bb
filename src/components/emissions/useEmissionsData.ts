import { useCallback, useEffect, useState } from 'react'
import { getLogger } from '@logtape/logtape'
import { getDataset } from '../../utils/datasetCache'
import type { CsvFetcher, Dataset } from '../../utils/emissions'
import { describeError } from '../../utils/errors'

const logger = getLogger(['dashboard', 'data'])

export interface EmissionsDataResult {
  loading: boolean
  error: string | null
  dataset: Dataset | null
  retry: () => void
}

export function useEmissionsData(path: string, fetcher?: CsvFetcher): EmissionsDataResult {
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)
  const [dataset, setDataset] = useState<Dataset | null>(null)
  const [attempt, setAttempt] = useState(0)

  useEffect(() => {
    let cancelled = false

    const load = async () => {
      try {
        const loaded = await getDataset(path, fetcher)
        if (cancelled) return

        setDataset(loaded)
        setError(null)
        setLoading(false)
      } catch (loadError) {
        if (cancelled) return
        logger.error('Failed to load emissions data from {path}: {message}', {
          path,
          message: describeError(loadError)
        })
        setDataset(null)
        setError(describeError(loadError))
        setLoading(false)
      }
    }

    setLoading(true)
    setError(null)
    void load()

    return () => {
      cancelled = true
    }
  }, [path, fetcher, attempt])

  const retry = useCallback(() => {
    setAttempt(previous => previous + 1)
  }, [])

  return { loading, error, dataset, retry }
}
