import type { Units } from '@/types/weather'
import { DETAIL_WINDOW_SIZE } from './forecastAggregator'
import { MissingApiKeyError } from './errors'

export const DEFAULT_CITY = 'Hyderabad'

export interface DashboardConfig {
  readonly apiKey: string
  readonly city: string
  readonly units: Units
  readonly detailWindowSize: number
}

export interface ConfigEnv {
  VITE_OPENWEATHER_API_KEY?: string
  VITE_DEFAULT_CITY?: string
}

export interface ConfigOverrides {
  apiKey?: string
  city?: string
}

const clean = (value: string | undefined) => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export const hasEnvApiKey = (env: ConfigEnv = import.meta.env) => Boolean(clean(env.VITE_OPENWEATHER_API_KEY))

/**
 * Builds the configuration a refresh runs with. Settings typed into the page take
 * precedence over the environment; the returned value is frozen.
 */
export const loadDashboardConfig = (
  env: ConfigEnv = import.meta.env,
  overrides: ConfigOverrides = {},
): DashboardConfig => {
  const apiKey = clean(overrides.apiKey) ?? clean(env.VITE_OPENWEATHER_API_KEY)
  if (!apiKey) {
    throw new MissingApiKeyError()
  }

  return Object.freeze({
    apiKey,
    city: clean(overrides.city) ?? clean(env.VITE_DEFAULT_CITY) ?? DEFAULT_CITY,
    units: 'metric',
    detailWindowSize: DETAIL_WINDOW_SIZE,
  })
}
