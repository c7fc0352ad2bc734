import { useMemo } from 'react'
import type { RawSample } from '@/types/weather'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { toDetailRows } from '@/lib/forecastAggregator'

interface DetailTableProps {
  samples: RawSample[]
}

const COLUMNS = ['Date & Time', 'Temp (°C)', 'Humidity (%)', 'Wind (m/s)', 'Rain (mm)', 'Weather'] as const

export const DetailTable = ({ samples }: DetailTableProps) => {
  const rows = useMemo(() => toDetailRows(samples), [samples])

  return (
    <Card>
      <CardHeader>
        <CardTitle>Detailed 3-hour Forecast</CardTitle>
      </CardHeader>
      <CardContent className="overflow-x-auto">
        {rows.length === 0 ? (
          <p className="text-sm text-slate-500">No near-term samples available.</p>
        ) : (
          <table className="w-full text-left text-sm">
            <thead>
              <tr className="border-b border-slate-200 text-xs uppercase tracking-wide text-slate-500">
                {COLUMNS.map((column) => (
                  <th key={column} scope="col" className="px-2 py-2 font-semibold">
                    {column}
                  </th>
                ))}
              </tr>
            </thead>
            <tbody>
              {rows.map((row) => (
                <tr key={row.id} className="border-b border-slate-100 last:border-none">
                  <td className="whitespace-nowrap px-2 py-1.5 font-medium text-slate-700">{row.timeLabel}</td>
                  <td className="px-2 py-1.5 font-mono">{row.temperature.toFixed(1)}</td>
                  <td className="px-2 py-1.5 font-mono">{row.humidity}</td>
                  <td className="px-2 py-1.5 font-mono">{row.windSpeed.toFixed(1)}</td>
                  <td className="px-2 py-1.5 font-mono">{row.rain.toFixed(1)}</td>
                  <td className="px-2 py-1.5 text-slate-600">{row.description}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </CardContent>
    </Card>
  )
}

export default DetailTable
