import type { ComponentType } from 'react'
import { motion } from 'framer-motion'
import { CloudSun, Droplets, ThermometerSun, Wind } from 'lucide-react'
import type { CurrentConditions } from '@/types/weather'
import { formatCelsius } from '@/lib/utils'

interface ConditionCard {
  id: string
  label: string
  value: string
  caption?: string
  icon: ComponentType<{ className?: string }>
}

export const buildConditionCards = (current: CurrentConditions): ConditionCard[] => [
  {
    id: 'temperature',
    label: 'Temperature',
    value: formatCelsius(current.temperature),
    caption: `Current temperature in ${current.locationName}`,
    icon: ThermometerSun,
  },
  {
    id: 'humidity',
    label: 'Humidity',
    value: `${current.humidity}%`,
    icon: Droplets,
  },
  {
    id: 'wind',
    label: 'Wind speed',
    value: `${current.windSpeed} m/s`,
    icon: Wind,
  },
  {
    id: 'condition',
    label: 'Condition',
    value: current.description,
    icon: CloudSun,
  },
]

interface ConditionCardsProps {
  current: CurrentConditions
}

export const ConditionCards = ({ current }: ConditionCardsProps) => (
  <section aria-label="Current conditions" className="grid grid-cols-1 gap-3 sm:grid-cols-2 lg:grid-cols-4">
    {buildConditionCards(current).map(({ id, label, value, caption, icon: Icon }) => (
      <motion.div
        key={id}
        initial={{ opacity: 0, y: 10 }}
        animate={{ opacity: 1, y: 0 }}
        transition={{ type: 'spring', stiffness: 160, damping: 20 }}
        className="flex h-full items-start gap-3 rounded-3xl border border-white/70 bg-white/85 p-5 shadow-[0_18px_38px_-28px_rgba(15,23,42,0.45)]"
      >
        <span className="flex h-10 w-10 shrink-0 items-center justify-center rounded-full bg-gradient-to-br from-slate-100 via-sky-100 to-white text-sky-600">
          <Icon className="h-5 w-5" aria-hidden />
        </span>
        <div className="space-y-1">
          <p className="text-2xl font-semibold text-slate-900">{value}</p>
          <p className="text-xs text-slate-500">{caption ?? label}</p>
        </div>
      </motion.div>
    ))}
  </section>
)

export default ConditionCards
