import { useMemo } from 'react'
import {
  Area,
  Bar,
  CartesianGrid,
  ComposedChart,
  Legend,
  Line,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts'
import type { DailySummary } from '@/types/weather'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { toChartPoints } from './chartData'

interface ForecastChartProps {
  summaries: DailySummary[]
  city: string
}

const TEMPERATURE_COLOR = '#0a84ff'
const RAIN_COLOR = '#38bdf8'

export const ForecastChart = ({ summaries, city }: ForecastChartProps) => {
  const points = useMemo(() => toChartPoints(summaries), [summaries])

  return (
    <Card>
      <CardHeader>
        <CardTitle>5-Day Forecast: Temperature &amp; Rainfall</CardTitle>
        <p className="text-xs text-slate-500">Temperature &amp; Rainfall Forecast for {city}</p>
      </CardHeader>
      <CardContent>
        {points.length === 0 ? (
          <div className="flex h-64 items-center justify-center rounded-2xl border border-dashed border-slate-200 text-sm text-slate-500">
            No forecast samples to chart yet.
          </div>
        ) : (
          <div className="h-[320px] w-full">
            <ResponsiveContainer width="100%" height="100%">
              <ComposedChart data={points} margin={{ top: 8, right: 8, bottom: 0, left: 0 }}>
                <CartesianGrid strokeDasharray="3 3" opacity={0.2} />
                <XAxis dataKey="label" tick={{ fontSize: 12 }} />
                <YAxis
                  yAxisId="temperature"
                  tick={{ fontSize: 12 }}
                  width={40}
                  allowDecimals={false}
                  label={{ value: 'Temperature (°C)', angle: -90, position: 'insideLeft', fontSize: 11 }}
                />
                <YAxis
                  yAxisId="rain"
                  orientation="right"
                  tick={{ fontSize: 12 }}
                  width={40}
                  label={{ value: 'Rainfall (mm)', angle: 90, position: 'insideRight', fontSize: 11 }}
                />
                <Tooltip />
                <Legend wrapperStyle={{ paddingTop: '10px', fontSize: '12px' }} />
                <Bar
                  yAxisId="rain"
                  dataKey="totalRain"
                  name="Rain (mm)"
                  fill={RAIN_COLOR}
                  fillOpacity={0.35}
                  radius={[2, 2, 0, 0]}
                  maxBarSize={50}
                  isAnimationActive={false}
                />
                <Area
                  yAxisId="temperature"
                  dataKey="temperatureRange"
                  name="Min / Max (°C)"
                  stroke="none"
                  fill={TEMPERATURE_COLOR}
                  fillOpacity={0.12}
                  isAnimationActive={false}
                />
                <Line
                  yAxisId="temperature"
                  dataKey="meanTemp"
                  name="Avg Temp (°C)"
                  stroke={TEMPERATURE_COLOR}
                  strokeWidth={2.2}
                  dot={{ r: 4 }}
                  isAnimationActive={false}
                />
              </ComposedChart>
            </ResponsiveContainer>
          </div>
        )}
      </CardContent>
    </Card>
  )
}

export default ForecastChart
