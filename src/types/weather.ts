export type Units = 'metric'

export interface ForecastWeather {
  id: number
  main: string
  description: string
  icon: string
}

export interface ForecastEntry {
  dt: number
  main: {
    temp: number
    feels_like: number
    temp_min: number
    temp_max: number
    pressure: number
    sea_level?: number
    grnd_level?: number
    humidity: number
  }
  weather: ForecastWeather[]
  clouds?: {
    all: number
  }
  wind: {
    speed: number
    deg?: number
    gust?: number
  }
  visibility?: number
  pop?: number
  rain?: Record<string, number>
  snow?: Record<string, number>
  dt_txt?: string
}

export interface ForecastResponse {
  cod: string
  message: number
  cnt: number
  list: ForecastEntry[]
  city: {
    id: number
    name: string
    coord: {
      lat: number
      lon: number
    }
    country: string
    population?: number
    timezone: number
    sunrise?: number
    sunset?: number
  }
}

export interface CurrentWeatherResponse {
  dt: number
  name?: string
  main: {
    temp: number
    feels_like?: number
    humidity: number
    pressure?: number
  }
  weather: ForecastWeather[]
  wind: {
    speed: number
    deg?: number
    gust?: number
  }
  timezone?: number
}

/** One 3-hour forecast reading. `rainVolume3h` is omitted when the source had no rain bucket. */
export interface RawSample {
  timestamp: number
  temperature: number
  humidity: number
  windSpeed: number
  rainVolume3h?: number
  description: string
}

export interface DailySummary {
  date: Date
  dateKey: string
  meanTemp: number
  minTemp: number
  maxTemp: number
  totalRain: number
  meanHumidity: number
  sampleCount: number
  displayLabel: string
}

export interface DetailRow {
  id: string
  timeLabel: string
  temperature: number
  humidity: number
  windSpeed: number
  rain: number
  description: string
}

export interface CurrentConditions {
  temperature: number
  feelsLike: number
  humidity: number
  windSpeed: number
  description: string
  icon?: string
  locationName: string
}

export interface DashboardData {
  current: CurrentConditions
  samples: RawSample[]
  dailySummaries: DailySummary[]
  detailWindow: RawSample[]
  fetchedAt: Date
}
