/**
 * Dashboard configuration, read from Vite `VITE_*` environment variables.
 * See `.env.example` for the available keys.
 */

import type { LogLevel } from '@logtape/logtape'
import { z } from 'zod'
import { describeError } from '../utils/errors'

export const DEFAULT_ATLAS_URL = 'https://cdn.jsdelivr.net/npm/world-atlas@2/countries-50m.json'

export const DEFAULT_DATA_SOURCE_NOTE =
  'Bundled figures are an illustrative sample. Replace public/co2_emission_asean_clean.csv with the cleaned Global Carbon Budget export.'

const LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const satisfies readonly LogLevel[]

const EnvSchema = z.object({
  BASE_URL: z.string().default('/'),
  VITE_EMISSIONS_CSV: z.string().trim().min(1).default('co2_emission_asean_clean.csv'),
  VITE_DEFAULT_YEAR: z.coerce.number().int().min(1750).max(2100).default(2020),
  // An empty value turns the country outlines off
  VITE_ATLAS_URL: z.union([z.literal(''), z.string().url()]).default(DEFAULT_ATLAS_URL),
  VITE_TIMELAPSE_INTERVAL_MS: z.coerce.number().int().min(100).max(10000).default(800),
  VITE_DATA_SOURCE_NOTE: z.string().trim().default(''),
  VITE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
})

export interface DashboardConfig {
  emissionsCsvUrl: string
  defaultYear: number
  atlasUrl: string | null
  timelapseIntervalMs: number
  dataSourceNote: string
  logLevel: LogLevel
}

const isAbsolute = (path: string): boolean => /^(?:[a-z]+:)?\/\//i.test(path) || path.startsWith('/')

export const resolveAssetUrl = (baseUrl: string, path: string): string => {
  if (isAbsolute(path)) return path
  return `${baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`}${path}`
}

export function parseDashboardConfig(env: Record<string, unknown>): DashboardConfig {
  const result = EnvSchema.safeParse(env)
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid dashboard configuration: ${details}`)
  }

  const parsed = result.data
  return {
    emissionsCsvUrl: resolveAssetUrl(parsed.BASE_URL, parsed.VITE_EMISSIONS_CSV),
    defaultYear: parsed.VITE_DEFAULT_YEAR,
    atlasUrl: parsed.VITE_ATLAS_URL === '' ? null : parsed.VITE_ATLAS_URL,
    timelapseIntervalMs: parsed.VITE_TIMELAPSE_INTERVAL_MS,
    dataSourceNote: parsed.VITE_DATA_SOURCE_NOTE || DEFAULT_DATA_SOURCE_NOTE,
    logLevel: parsed.VITE_LOG_LEVEL
  }
}

export type ConfigResult = { ok: true; config: DashboardConfig } | { ok: false; message: string }

export function readDashboardConfig(env: Record<string, unknown>): ConfigResult {
  try {
    return { ok: true, config: parseDashboardConfig(env) }
  } catch (configError) {
    return { ok: false, message: describeError(configError) }
  }
}
