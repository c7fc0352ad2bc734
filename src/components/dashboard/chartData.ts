import type { DailySummary } from '@/types/weather'

export interface ForecastChartPoint {
  label: string
  meanTemp: number
  temperatureRange: [number, number]
  totalRain: number
}

const round1 = (value: number) => Math.round(value * 10) / 10

export const toChartPoints = (summaries: readonly DailySummary[]): ForecastChartPoint[] =>
  summaries.map((summary) => ({
    label: summary.displayLabel,
    meanTemp: round1(summary.meanTemp),
    temperatureRange: [summary.minTemp, summary.maxTemp],
    totalRain: round1(summary.totalRain),
  }))
