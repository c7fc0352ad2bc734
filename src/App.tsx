import { useCallback, useEffect, useRef, useState } from 'react'
import type { FormEvent } from 'react'
import { AnimatePresence, motion } from 'framer-motion'
import { AlertTriangle, KeyRound, Loader2, RefreshCw } from 'lucide-react'
import { Button } from '@/components/ui/button'
import {
  Card,
  CardContent,
  CardDescription,
  CardHeader,
  CardTitle,
} from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import ConditionCards from '@/components/dashboard/ConditionCards'
import ForecastChart from '@/components/dashboard/ForecastChart'
import DetailTable from '@/components/dashboard/DetailTable'
import SummaryInsights from '@/components/dashboard/SummaryInsights'
import { DEFAULT_CITY, hasEnvApiKey, loadDashboardConfig } from '@/lib/config'
import type { DashboardConfig } from '@/lib/config'
import { MissingApiKeyError } from '@/lib/errors'
import { loadDashboard } from '@/services/openWeather'
import type { DashboardData } from '@/types/weather'

const MISSING_KEY_WARNING = 'Please provide your OpenWeather API key in settings (or add VITE_OPENWEATHER_API_KEY to your environment).'

const initialConfig = (): DashboardConfig | null => {
  try {
    return loadDashboardConfig()
  } catch (err) {
    if (err instanceof MissingApiKeyError) {
      return null
    }
    throw err
  }
}

const formatRefreshTime = (date: Date) =>
  date.toLocaleTimeString([], {
    hour: '2-digit',
    minute: '2-digit',
  })

function App() {
  const [envKeyAvailable] = useState(() => hasEnvApiKey())
  const [config, setConfig] = useState<DashboardConfig | null>(initialConfig)
  const [apiKeyInput, setApiKeyInput] = useState('')
  const [cityInput, setCityInput] = useState(() => config?.city ?? DEFAULT_CITY)
  const [data, setData] = useState<DashboardData | null>(null)
  const [loading, setLoading] = useState(false)
  const [error, setError] = useState<string | null>(null)
  const requestIdRef = useRef(0)

  const refresh = useCallback(async (activeConfig: DashboardConfig) => {
    const requestId = requestIdRef.current + 1
    requestIdRef.current = requestId
    setLoading(true)
    setError(null)

    try {
      const next = await loadDashboard(activeConfig)
      if (requestIdRef.current !== requestId) {
        return
      }
      setData(next)
    } catch (err) {
      if (requestIdRef.current !== requestId) {
        return
      }
      if (import.meta.env.DEV) {
        console.error('Dashboard refresh failed:', err)
      }
      const message = err instanceof Error ? err.message : 'Error fetching weather data.'
      setError(`Failed to fetch data from OpenWeather. ${message}`)
      setData(null)
    } finally {
      if (requestIdRef.current === requestId) {
        setLoading(false)
      }
    }
  }, [])

  useEffect(() => {
    if (config) {
      void refresh(config)
    }
  }, [config, refresh])

  const handleSettingsSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    try {
      setConfig(loadDashboardConfig(import.meta.env, { apiKey: apiKeyInput, city: cityInput }))
    } catch (err) {
      setConfig(null)
      setData(null)
      setError(err instanceof Error ? err.message : MISSING_KEY_WARNING)
    }
  }

  const city = config?.city ?? (cityInput.trim() || DEFAULT_CITY)

  return (
    <div className="relative min-h-screen bg-gradient-to-b from-[#f7f7f8] to-white text-slate-900">
      <div className="mx-auto flex w-full max-w-6xl flex-col gap-6 px-4 py-10">
        <header className="flex flex-col gap-3 rounded-2xl bg-white/90 p-6 shadow-[0_8px_24px_rgba(15,23,42,0.06)] sm:flex-row sm:items-center sm:justify-between">
          <div>
            <h1 className="text-3xl font-bold">Live Weather Dashboard – {city}</h1>
            <p className="text-sm text-slate-500">
              {data ? `Updated ${formatRefreshTime(data.fetchedAt)} · ` : ''}
              Current conditions and the 5-day / 3-hour forecast.
            </p>
          </div>
          <Button
            variant="outline"
            onClick={() => {
              if (config) {
                void refresh(config)
              }
            }}
            disabled={!config || loading}
          >
            {loading ? <Loader2 className="h-4 w-4 animate-spin" aria-hidden /> : <RefreshCw className="h-4 w-4" aria-hidden />}
            Refresh
          </Button>
        </header>

        <Card>
          <CardHeader className="pb-3">
            <CardTitle className="flex items-center gap-2 text-base">
              <KeyRound className="h-4 w-4 text-slate-500" aria-hidden />
              Settings
            </CardTitle>
            <CardDescription>
              {envKeyAvailable
                ? 'API key loaded from the environment.'
                : 'An API key is required to fetch live data from OpenWeather. It is kept for this session only.'}
            </CardDescription>
          </CardHeader>
          <CardContent>
            <form className="flex flex-col gap-3 sm:flex-row sm:items-end" onSubmit={handleSettingsSubmit}>
              {envKeyAvailable ? null : (
                <label className="flex flex-1 flex-col gap-1 text-sm font-medium text-slate-700" htmlFor="api-key">
                  OpenWeather API key
                  <Input
                    id="api-key"
                    type="password"
                    autoComplete="off"
                    value={apiKeyInput}
                    onChange={(event) => setApiKeyInput(event.target.value)}
                  />
                </label>
              )}
              <label className="flex flex-1 flex-col gap-1 text-sm font-medium text-slate-700" htmlFor="city">
                City
                <Input
                  id="city"
                  value={cityInput}
                  onChange={(event) => setCityInput(event.target.value)}
                />
              </label>
              <label className="flex flex-col gap-1 text-sm font-medium text-slate-700" htmlFor="units">
                Units
                <select
                  id="units"
                  className="h-10 rounded-xl border border-slate-200 bg-white/80 px-3 text-sm"
                  defaultValue="metric"
                  disabled
                >
                  <option value="metric">metric (°C)</option>
                </select>
              </label>
              <Button type="submit">Load forecast</Button>
            </form>
          </CardContent>
        </Card>

        <AnimatePresence mode="wait">
          {!config && !error ? (
            <motion.div
              key="missing-key"
              initial={{ opacity: 0, y: 12 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -12 }}
              className="rounded-2xl border border-amber-200 bg-amber-50/80 p-4 text-sm text-amber-800"
            >
              {MISSING_KEY_WARNING}
            </motion.div>
          ) : null}

          {error ? (
            <motion.div
              key="error"
              role="alert"
              initial={{ opacity: 0, y: 12 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -12 }}
              className="flex flex-col gap-3 rounded-2xl border border-rose-200 bg-rose-50/80 p-4 text-sm text-rose-700"
            >
              <p className="flex items-center gap-2">
                <AlertTriangle className="h-4 w-4" aria-hidden />
                {error}
              </p>
              {config ? (
                <Button variant="outline" size="sm" className="self-start" onClick={() => void refresh(config)}>
                  Try again
                </Button>
              ) : null}
            </motion.div>
          ) : null}

          {!error && loading && !data ? (
            <motion.div
              key="loading"
              initial={{ opacity: 0 }}
              animate={{ opacity: 1 }}
              exit={{ opacity: 0 }}
              className="flex items-center gap-2 text-sm text-slate-500"
            >
              <Loader2 className="h-4 w-4 animate-spin" aria-hidden />
              Fetching live weather data…
            </motion.div>
          ) : null}

          {!error && data ? (
            <motion.main
              key="dashboard"
              initial={{ opacity: 0, y: 24 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0, y: -24 }}
              transition={{ type: 'spring', stiffness: 120, damping: 18 }}
              className="flex flex-col gap-6"
            >
              <ConditionCards current={data.current} />
              <div className="grid grid-cols-1 gap-6 lg:grid-cols-[2fr,1.2fr]">
                <div className="flex min-w-0 flex-col gap-6">
                  <ForecastChart summaries={data.dailySummaries} city={city} />
                  <DetailTable samples={data.detailWindow} />
                </div>
                <SummaryInsights current={data.current} summaries={data.dailySummaries} />
              </div>
            </motion.main>
          ) : null}
        </AnimatePresence>

        <footer className="py-4 text-center text-xs text-slate-500">
          Weather data provided by OpenWeather.
        </footer>
      </div>
    </div>
  )
}

export default App
