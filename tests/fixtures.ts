import type { CurrentWeatherResponse, ForecastEntry, RawSample } from '@/types/weather'

/** Unix seconds for a local wall-clock time, so date grouping is stable in any TZ. */
export const at = (year: number, month: number, day: number, hour = 12) =>
  Math.floor(new Date(year, month - 1, day, hour).getTime() / 1000)

export const createSample = (overrides: Partial<RawSample> = {}): RawSample => ({
  timestamp: at(2025, 6, 5, 9),
  temperature: 28,
  humidity: 60,
  windSpeed: 3.1,
  rainVolume3h: 0,
  description: 'Clear Sky',
  ...overrides,
})

// Two days of four readings each: 06-05 and 06-06.
export const twoDaySamples = (): RawSample[] => [
  createSample({ timestamp: at(2025, 6, 5, 9), temperature: 28, rainVolume3h: 0, humidity: 60 }),
  createSample({ timestamp: at(2025, 6, 5, 12), temperature: 30, rainVolume3h: 1.2, humidity: 62 }),
  createSample({ timestamp: at(2025, 6, 5, 15), temperature: 29, rainVolume3h: 0, humidity: 64 }),
  createSample({ timestamp: at(2025, 6, 5, 18), temperature: 31, rainVolume3h: 0.5, humidity: 66 }),
  createSample({ timestamp: at(2025, 6, 6, 9), temperature: 27, rainVolume3h: 2.0, humidity: 70 }),
  createSample({ timestamp: at(2025, 6, 6, 12), temperature: 26, rainVolume3h: 0, humidity: 72 }),
  createSample({ timestamp: at(2025, 6, 6, 15), temperature: 28, rainVolume3h: 0, humidity: 74 }),
  createSample({ timestamp: at(2025, 6, 6, 18), temperature: 29, rainVolume3h: 0.3, humidity: 76 }),
]

export const createForecastEntry = (overrides: Partial<ForecastEntry> = {}): ForecastEntry => ({
  dt: at(2025, 6, 5, 9),
  main: {
    temp: 28.4,
    feels_like: 30.1,
    temp_min: 27.9,
    temp_max: 28.4,
    pressure: 1006,
    humidity: 61,
  },
  weather: [
    {
      id: 500,
      main: 'Rain',
      description: 'light rain',
      icon: '10d',
    },
  ],
  clouds: { all: 75 },
  wind: { speed: 4.2, deg: 250 },
  pop: 0.4,
  rain: { '3h': 0.6 },
  ...overrides,
})

export const createCurrentResponse = (overrides: Partial<CurrentWeatherResponse> = {}): CurrentWeatherResponse => ({
  dt: at(2025, 6, 5, 8),
  name: 'Hyderabad',
  main: {
    temp: 29.34,
    feels_like: 32.06,
    humidity: 58,
  },
  weather: [
    {
      id: 803,
      main: 'Clouds',
      description: 'broken clouds',
      icon: '04d',
    },
  ],
  wind: { speed: 3.6 },
  ...overrides,
})
