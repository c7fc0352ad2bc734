import type { CurrentConditions, DailySummary } from '@/types/weather'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/card'
import { Badge } from '@/components/ui/badge'
import { formatCelsius } from '@/lib/utils'

// 8 three-hour buckets make a full day
const FULL_DAY_SAMPLES = 8

interface SummaryInsightsProps {
  current: CurrentConditions
  summaries: DailySummary[]
}

export const formatDigestLine = (summary: DailySummary) =>
  `${summary.displayLabel}: Avg ${formatCelsius(summary.meanTemp)} • Rain ${summary.totalRain.toFixed(1)} mm`

export const SummaryInsights = ({ current, summaries }: SummaryInsightsProps) => (
  <Card>
    <CardHeader>
      <CardTitle>Summary Insights</CardTitle>
    </CardHeader>
    <CardContent className="space-y-4 text-sm text-slate-700">
      <dl className="grid grid-cols-[auto,1fr] gap-x-3 gap-y-1">
        <dt className="font-semibold">Location</dt>
        <dd>{current.locationName}</dd>
        <dt className="font-semibold">Temperature (now)</dt>
        <dd>
          {formatCelsius(current.temperature)} (feels like {formatCelsius(current.feelsLike)})
        </dd>
        <dt className="font-semibold">Humidity</dt>
        <dd>{current.humidity}%</dd>
        <dt className="font-semibold">Wind</dt>
        <dd>{current.windSpeed} m/s</dd>
        <dt className="font-semibold">Condition</dt>
        <dd>{current.description}</dd>
      </dl>
      <div className="space-y-2 border-t border-slate-200 pt-3">
        <p className="font-semibold">Forecast Summary (next days)</p>
        {summaries.length ? (
          <ul className="space-y-1">
            {summaries.map((summary) => (
              <li key={summary.dateKey} className="flex items-center justify-between gap-2">
                <span>{formatDigestLine(summary)}</span>
                {summary.sampleCount < FULL_DAY_SAMPLES ? (
                  <Badge variant="outline" title={`${summary.sampleCount} of ${FULL_DAY_SAMPLES} readings`}>
                    Partial
                  </Badge>
                ) : null}
              </li>
            ))}
          </ul>
        ) : (
          <p className="text-slate-500">No forecast days available.</p>
        )}
      </div>
    </CardContent>
  </Card>
)

export default SummaryInsights
