import { beforeEach, describe, it, expect, vi } from 'vitest'
import { getDataset, resetDatasetCache } from '../datasetCache'
import type { CsvFetcher } from '../emissions'
import { SAMPLE_CSV, csvResponse } from '../../test/fixtures'

describe('getDataset', () => {
  beforeEach(() => {
    resetDatasetCache()
  })

  it('loads each path once', async () => {
    const fetcher = vi.fn<CsvFetcher>(async () => csvResponse(SAMPLE_CSV))

    const first = await getDataset('/cached.csv', fetcher)
    const second = await getDataset('/cached.csv', fetcher)

    expect(second).toBe(first)
    expect(fetcher).toHaveBeenCalledTimes(1)
  })

  it('drops a failed load so the next call retries', async () => {
    const fetcher = vi
      .fn<CsvFetcher>()
      .mockResolvedValueOnce(csvResponse('', 500))
      .mockResolvedValueOnce(csvResponse(SAMPLE_CSV))

    await expect(getDataset('/flaky.csv', fetcher)).rejects.toThrow('Failed to load /flaky.csv (500)')
    const dataset = await getDataset('/flaky.csv', fetcher)

    expect(dataset.records).toHaveLength(3)
    expect(fetcher).toHaveBeenCalledTimes(2)
  })

  it('starts over after a reset', async () => {
    const fetcher = vi.fn<CsvFetcher>(async () => csvResponse(SAMPLE_CSV))

    await getDataset('/reset.csv', fetcher)
    resetDatasetCache()
    await getDataset('/reset.csv', fetcher)

    expect(fetcher).toHaveBeenCalledTimes(2)
  })
})
