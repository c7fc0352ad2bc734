export class MalformedSampleError extends Error {
  readonly index: number
  readonly record: unknown

  constructor(index: number, record: unknown, reason: string) {
    super(`Forecast sample #${index} is malformed: ${reason}`)
    this.name = 'MalformedSampleError'
    this.index = index
    this.record = record
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

export class WeatherRequestError extends Error {
  readonly status: number

  constructor(status: number, body: string) {
    super(`OpenWeather error (${status}): ${body}`)
    this.name = 'WeatherRequestError'
    this.status = status
  }
}

export class MissingApiKeyError extends Error {
  constructor() {
    super('Missing OpenWeather API key. Add VITE_OPENWEATHER_API_KEY to your environment or paste one in settings.')
    this.name = 'MissingApiKeyError'
  }
}
