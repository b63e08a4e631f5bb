import { beforeEach, describe, it, expect, vi } from 'vitest'
import { act, renderHook, waitFor } from '@testing-library/react'
import { useEmissionsData } from '../useEmissionsData'
import { resetDatasetCache } from '../../../utils/datasetCache'
import type { CsvFetcher } from '../../../utils/emissions'
import { SAMPLE_CSV, csvResponse } from '../../../test/fixtures'

describe('useEmissionsData', () => {
  beforeEach(() => {
    resetDatasetCache()
  })

  it('starts loading and then exposes the dataset', async () => {
    const fetcher = vi.fn<CsvFetcher>(async () => csvResponse(SAMPLE_CSV))
    const { result } = renderHook(() => useEmissionsData('/hook.csv', fetcher))

    expect(result.current.loading).toBe(true)

    await waitFor(() => {
      expect(result.current.loading).toBe(false)
    })
    expect(result.current.error).toBeNull()
    expect(result.current.dataset?.records).toHaveLength(3)
  })

  it('surfaces load failures and recovers on retry', async () => {
    const fetcher = vi
      .fn<CsvFetcher>()
      .mockResolvedValueOnce(csvResponse('', 404))
      .mockResolvedValueOnce(csvResponse(SAMPLE_CSV))
    const { result } = renderHook(() => useEmissionsData('/missing.csv', fetcher))

    await waitFor(() => {
      expect(result.current.error).toBe('Failed to load /missing.csv (404)')
    })
    expect(result.current.dataset).toBeNull()

    act(() => result.current.retry())

    await waitFor(() => {
      expect(result.current.dataset?.records).toHaveLength(3)
    })
    expect(result.current.error).toBeNull()
    expect(fetcher).toHaveBeenCalledTimes(2)
  })
})
