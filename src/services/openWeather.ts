import type {
  CurrentConditions,
  CurrentWeatherResponse,
  DashboardData,
  ForecastEntry,
  ForecastResponse,
  RawSample,
} from '@/types/weather'
import type { DashboardConfig } from '@/lib/config'
import { MalformedResponseError, MalformedSampleError, WeatherRequestError } from '@/lib/errors'
import { buildDailySummaries, buildDetailWindow } from '@/lib/forecastAggregator'
import { titleCase } from '@/lib/utils'

const API_BASE = 'https://api.openweathermap.org'

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

const fetchJson = async <T>(url: string): Promise<T> => {
  const response = await fetch(url)
  if (!response.ok) {
    const message = await response.text()
    throw new WeatherRequestError(response.status, message)
  }
  return response.json() as Promise<T>
}

const buildUrl = (path: 'weather' | 'forecast', config: DashboardConfig) => {
  const params = new URLSearchParams({
    q: config.city,
    units: config.units,
    appid: config.apiKey,
  })
  return `${API_BASE}/data/2.5/${path}?${params.toString()}`
}

export const fetchCurrentWeather = async (config: DashboardConfig): Promise<CurrentWeatherResponse> =>
  fetchJson<CurrentWeatherResponse>(buildUrl('weather', config))

// 5 day / 3 hour forecast, roughly 40 entries
export const fetchForecast = async (config: DashboardConfig): Promise<ForecastResponse> =>
  fetchJson<ForecastResponse>(buildUrl('forecast', config))

const readRain = (entry: ForecastEntry): number | undefined => {
  const bucket = entry.rain?.['3h']
  if (bucket === undefined) {
    return undefined
  }
  if (!isFiniteNumber(bucket) || bucket < 0) {
    if (import.meta.env.DEV) {
      console.warn('Ignoring unreadable rain bucket on forecast entry', entry.dt, bucket)
    }
    return undefined
  }
  return bucket
}

export const toRawSample = (entry: ForecastEntry, index: number): RawSample => {
  if (!isRecord(entry)) {
    throw new MalformedSampleError(index, entry, 'expected an object')
  }
  if (!isFiniteNumber(entry.dt)) {
    throw new MalformedSampleError(index, entry, 'dt is missing or not a number')
  }
  if (!isRecord(entry.main) || !isFiniteNumber(entry.main.temp)) {
    throw new MalformedSampleError(index, entry, 'main.temp is missing or not a number')
  }
  if (!isFiniteNumber(entry.main.humidity)) {
    throw new MalformedSampleError(index, entry, 'main.humidity is missing or not a number')
  }
  if (!isRecord(entry.wind) || !isFiniteNumber(entry.wind.speed)) {
    throw new MalformedSampleError(index, entry, 'wind.speed is missing or not a number')
  }
  const primary = Array.isArray(entry.weather) ? entry.weather[0] : undefined
  if (!primary || typeof primary.description !== 'string') {
    throw new MalformedSampleError(index, entry, 'weather[0].description is missing')
  }

  const sample: RawSample = {
    timestamp: entry.dt,
    temperature: entry.main.temp,
    humidity: entry.main.humidity,
    windSpeed: entry.wind.speed,
    description: titleCase(primary.description),
  }
  const rain = readRain(entry)
  if (rain !== undefined) {
    sample.rainVolume3h = rain
  }
  return sample
}

export const toRawSamples = (response: ForecastResponse): RawSample[] => {
  if (!isRecord(response) || !Array.isArray(response.list)) {
    throw new MalformedResponseError('Forecast response is missing its list of samples.')
  }
  return response.list.map(toRawSample)
}

export const toCurrentConditions = (
  response: CurrentWeatherResponse,
  fallbackCity: string,
): CurrentConditions => {
  if (!isRecord(response) || !isRecord(response.main) || !isRecord(response.wind)) {
    throw new MalformedResponseError('Current weather response is missing its main or wind block.')
  }
  const { temp, feels_like: feelsLike, humidity } = response.main
  if (!isFiniteNumber(temp) || !isFiniteNumber(humidity) || !isFiniteNumber(response.wind.speed)) {
    throw new MalformedResponseError('Current weather response has non-numeric readings.')
  }
  const primary = Array.isArray(response.weather) ? response.weather[0] : undefined
  if (!primary || typeof primary.description !== 'string') {
    throw new MalformedResponseError('Current weather response is missing a condition description.')
  }

  return {
    temperature: temp,
    feelsLike: isFiniteNumber(feelsLike) ? feelsLike : temp,
    humidity,
    windSpeed: response.wind.speed,
    description: titleCase(primary.description),
    icon: primary.icon,
    locationName: response.name?.trim() ? response.name : fallbackCity,
  }
}

interface LoadDashboardOptions {
  now?: () => Date
}

/**
 * Runs one refresh: both requests, payload parsing and aggregation.
 * Any fetch or parse failure rejects before the aggregator sees data.
 */
export const loadDashboard = async (
  config: DashboardConfig,
  { now = () => new Date() }: LoadDashboardOptions = {},
): Promise<DashboardData> => {
  const [currentResponse, forecastResponse] = await Promise.all([
    fetchCurrentWeather(config),
    fetchForecast(config),
  ])

  const current = toCurrentConditions(currentResponse, config.city)
  const samples = toRawSamples(forecastResponse)

  return {
    current,
    samples,
    dailySummaries: buildDailySummaries(samples),
    detailWindow: buildDetailWindow(samples, config.detailWindowSize),
    fetchedAt: now(),
  }
}

export const __internal = {
  buildUrl,
}
