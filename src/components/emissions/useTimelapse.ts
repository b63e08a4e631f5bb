import { useCallback, useEffect, useState, type Dispatch, type SetStateAction } from 'react'

interface TimelapseOptions {
  year: number
  yearRange: readonly [number, number]
  setYear: Dispatch<SetStateAction<number>>
  intervalMs: number
}

export interface TimelapseControls {
  playing: boolean
  toggle: () => void
  stop: () => void
}

/**
 * Steps the selected year forward once per interval until the last year.
 * Starting from the last year rewinds to the first.
 */
export function useTimelapse({ year, yearRange, setYear, intervalMs }: TimelapseOptions): TimelapseControls {
  const [playing, setPlaying] = useState(false)
  const [minYear, maxYear] = yearRange

  useEffect(() => {
    if (!playing) return

    const timer = setInterval(() => {
      setYear(previous => (previous < maxYear ? previous + 1 : previous))
    }, intervalMs)

    return () => clearInterval(timer)
  }, [playing, intervalMs, maxYear, setYear])

  useEffect(() => {
    if (playing && year >= maxYear) {
      setPlaying(false)
    }
  }, [playing, year, maxYear])

  const toggle = useCallback(() => {
    if (playing) {
      setPlaying(false)
      return
    }
    if (year >= maxYear) {
      setYear(minYear)
    }
    setPlaying(true)
  }, [playing, year, minYear, maxYear, setYear])

  const stop = useCallback(() => setPlaying(false), [])

  return { playing, toggle, stop }
}
