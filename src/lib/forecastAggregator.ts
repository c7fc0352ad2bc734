import type { DailySummary, DetailRow, RawSample } from '@/types/weather'
import { MalformedSampleError } from './errors'

export const DETAIL_WINDOW_SIZE = 12

const WEEKDAY_ABBREVIATIONS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const
const MONTH_ABBREVIATIONS = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const

const pad2 = (value: number) => String(value).padStart(2, '0')

const toDate = (timestamp: number) => new Date(timestamp * 1000)

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

/**
 * Rejects samples whose required readings are missing or not finite.
 * Rain is optional but, when present, has to be a finite non-negative volume.
 */
export const assertRawSample = (sample: RawSample, index: number): void => {
  if (!sample || typeof sample !== 'object') {
    throw new MalformedSampleError(index, sample, 'expected an object')
  }
  if (!isFiniteNumber(sample.timestamp)) {
    throw new MalformedSampleError(index, sample, 'timestamp is missing or not a number')
  }
  if (!isFiniteNumber(sample.temperature)) {
    throw new MalformedSampleError(index, sample, 'temperature is missing or not a number')
  }
  if (!isFiniteNumber(sample.humidity)) {
    throw new MalformedSampleError(index, sample, 'humidity is missing or not a number')
  }
  if (!isFiniteNumber(sample.windSpeed)) {
    throw new MalformedSampleError(index, sample, 'wind speed is missing or not a number')
  }
  if (typeof sample.description !== 'string') {
    throw new MalformedSampleError(index, sample, 'description is missing')
  }
  if (sample.rainVolume3h !== undefined && (!isFiniteNumber(sample.rainVolume3h) || sample.rainVolume3h < 0)) {
    throw new MalformedSampleError(index, sample, 'rain volume must be a non-negative number')
  }
}

export const rainOf = (sample: RawSample) => sample.rainVolume3h ?? 0

/** `YYYY-MM-DD` of the local calendar date the timestamp falls on. */
export const toDateKey = (timestamp: number) => {
  const date = toDate(timestamp)
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`
}

export const formatDisplayLabel = (date: Date) =>
  `${WEEKDAY_ABBREVIATIONS[date.getDay()]} ${pad2(date.getDate())} ${MONTH_ABBREVIATIONS[date.getMonth()]}`

export const formatDetailTime = (timestamp: number) => {
  const date = toDate(timestamp)
  return `${pad2(date.getDate())} ${MONTH_ABBREVIATIONS[date.getMonth()]} ${pad2(date.getHours())}:${pad2(date.getMinutes())}`
}

interface DayAccumulator {
  date: Date
  count: number
  temperatureSum: number
  temperatureMin: number
  temperatureMax: number
  rainSum: number
  humiditySum: number
  humidityMin: number
  humidityMax: number
}

// Float summation can push a mean of repeated readings past its own extremes.
const boundedMean = (sum: number, count: number, min: number, max: number) =>
  Math.min(Math.max(sum / count, min), max)

export const buildDailySummaries = (samples: readonly RawSample[]): DailySummary[] => {
  const days = new Map<string, DayAccumulator>()

  samples.forEach((sample, index) => {
    assertRawSample(sample, index)

    const key = toDateKey(sample.timestamp)
    const existing = days.get(key)
    if (existing) {
      existing.count += 1
      existing.temperatureSum += sample.temperature
      existing.temperatureMin = Math.min(existing.temperatureMin, sample.temperature)
      existing.temperatureMax = Math.max(existing.temperatureMax, sample.temperature)
      existing.rainSum += rainOf(sample)
      existing.humiditySum += sample.humidity
      existing.humidityMin = Math.min(existing.humidityMin, sample.humidity)
      existing.humidityMax = Math.max(existing.humidityMax, sample.humidity)
      return
    }

    const moment = toDate(sample.timestamp)
    days.set(key, {
      date: new Date(moment.getFullYear(), moment.getMonth(), moment.getDate()),
      count: 1,
      temperatureSum: sample.temperature,
      temperatureMin: sample.temperature,
      temperatureMax: sample.temperature,
      rainSum: rainOf(sample),
      humiditySum: sample.humidity,
      humidityMin: sample.humidity,
      humidityMax: sample.humidity,
    })
  })

  return Array.from(days.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([dateKey, day]) => ({
      date: day.date,
      dateKey,
      meanTemp: boundedMean(day.temperatureSum, day.count, day.temperatureMin, day.temperatureMax),
      minTemp: day.temperatureMin,
      maxTemp: day.temperatureMax,
      totalRain: day.rainSum,
      meanHumidity: boundedMean(day.humiditySum, day.count, day.humidityMin, day.humidityMax),
      sampleCount: day.count,
      displayLabel: formatDisplayLabel(day.date),
    }))
}

export const buildDetailWindow = (
  samples: readonly RawSample[],
  limit: number = DETAIL_WINDOW_SIZE,
): RawSample[] => {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`Detail window limit must be a non-negative integer, received ${limit}.`)
  }
  return samples.slice(0, limit)
}

export const toDetailRows = (samples: readonly RawSample[]): DetailRow[] =>
  samples.map((sample, index) => ({
    id: `sample-${index}-${sample.timestamp}`,
    timeLabel: formatDetailTime(sample.timestamp),
    temperature: sample.temperature,
    humidity: sample.humidity,
    windSpeed: sample.windSpeed,
    rain: rainOf(sample),
    description: sample.description,
  }))
