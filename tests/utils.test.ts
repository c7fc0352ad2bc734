import { describe, expect, it } from 'vitest'
import { formatCelsius, titleCase } from '@/lib/utils'

describe('titleCase', () => {
  it('capitalises every word of a condition label', () => {
    expect(titleCase('light rain')).toBe('Light Rain')
    expect(titleCase('thunderstorm with heavy rain')).toBe('Thunderstorm With Heavy Rain')
  })

  it('lower-cases the rest of each word', () => {
    expect(titleCase('OVERCAST CLOUDS')).toBe('Overcast Clouds')
  })

  it('treats punctuation as a word boundary', () => {
    expect(titleCase('rain/snow mix')).toBe('Rain/Snow Mix')
  })
})

describe('formatCelsius', () => {
  it('renders one decimal place', () => {
    expect(formatCelsius(29.34)).toBe('29.3°C')
    expect(formatCelsius(30)).toBe('30.0°C')
  })
})
