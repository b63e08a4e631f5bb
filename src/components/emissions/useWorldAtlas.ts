import { useEffect, useState } from 'react'
import { getLogger } from '@logtape/logtape'
import { feature } from 'topojson-client'
import type { GeometryCollection, Topology } from 'topojson-specification'
import type { FeatureCollection } from 'geojson'
import { describeError } from '../../utils/errors'

const logger = getLogger(['dashboard', 'view'])

type CountriesTopology = Topology<{ countries: GeometryCollection }>

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

export const isCountriesTopology = (value: unknown): value is CountriesTopology => {
  if (!isRecord(value) || value.type !== 'Topology' || !Array.isArray(value.arcs)) return false
  if (!isRecord(value.objects)) return false
  const countries = value.objects.countries
  return isRecord(countries) && countries.type === 'GeometryCollection'
}

// One download per atlas URL for the page lifetime; failed loads are dropped so a later mount retries
const atlasCache = new Map<string, Promise<FeatureCollection>>()

const fetchWorldAtlas = async (url: string): Promise<FeatureCollection> => {
  const response = await fetch(url)
  if (!response.ok) {
    throw new Error(`Failed to load world atlas (${response.status})`)
  }

  const topology: unknown = await response.json()
  if (!isCountriesTopology(topology)) {
    throw new Error('World atlas has no countries object')
  }
  return feature(topology, topology.objects.countries)
}

export function loadWorldAtlas(url: string): Promise<FeatureCollection> {
  const cached = atlasCache.get(url)
  if (cached) return cached

  const pending = fetchWorldAtlas(url).catch((atlasError: unknown) => {
    atlasCache.delete(url)
    throw atlasError
  })
  atlasCache.set(url, pending)
  return pending
}

export const resetWorldAtlasCache = (): void => {
  atlasCache.clear()
}

/**
 * Loads the world-atlas countries as GeoJSON, shared across mounts.
 * Resolves to null when no URL is given or the atlas cannot be loaded; the
 * map then draws without outlines.
 */
export function useWorldAtlas(url: string | null): FeatureCollection | null {
  const [countries, setCountries] = useState<FeatureCollection | null>(null)

  useEffect(() => {
    if (url === null) {
      setCountries(null)
      return
    }

    let cancelled = false

    const load = async () => {
      try {
        const outlines = await loadWorldAtlas(url)
        if (cancelled) return
        setCountries(outlines)
      } catch (atlasError) {
        if (cancelled) return
        logger.warn('Map outlines unavailable: {message}', { message: describeError(atlasError) })
        setCountries(null)
      }
    }

    void load()

    return () => {
      cancelled = true
    }
  }, [url])

  return countries
}
