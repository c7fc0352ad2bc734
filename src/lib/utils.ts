import { clsx, type ClassValue } from 'clsx'
import { twMerge } from 'tailwind-merge'

export const cn = (...inputs: ClassValue[]) => twMerge(clsx(inputs))

/** Upper-cases the first letter of every word and lower-cases the rest: "light RAIN" -> "Light Rain". */
export const titleCase = (value: string) =>
  value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => `${boundary}${letter.toUpperCase()}`)

export const formatCelsius = (value: number) => `${value.toFixed(1)}°C`
