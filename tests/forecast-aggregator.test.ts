import { describe, expect, it } from 'vitest'
import type { RawSample } from '@/types/weather'
import {
  buildDailySummaries,
  buildDetailWindow,
  formatDetailTime,
  formatDisplayLabel,
  toDateKey,
  toDetailRows,
} from '@/lib/forecastAggregator'
import { MalformedSampleError } from '@/lib/errors'
import { at, createSample, twoDaySamples } from './fixtures'

describe('buildDailySummaries', () => {
  it('aggregates two days of three-hour samples', () => {
    const [first, second] = buildDailySummaries(twoDaySamples())

    expect(first?.dateKey).toBe('2025-06-05')
    expect(first?.meanTemp).toBe(29.5)
    expect(first?.minTemp).toBe(28)
    expect(first?.maxTemp).toBe(31)
    expect(first?.totalRain).toBeCloseTo(1.7, 10)
    expect(first?.meanHumidity).toBe(63)
    expect(first?.sampleCount).toBe(4)
    expect(first?.displayLabel).toBe('Thu 05 Jun')

    expect(second?.dateKey).toBe('2025-06-06')
    expect(second?.meanTemp).toBe(27.5)
    expect(second?.minTemp).toBe(26)
    expect(second?.maxTemp).toBe(29)
    expect(second?.totalRain).toBeCloseTo(2.3, 10)
    expect(second?.meanHumidity).toBe(73)
    expect(second?.displayLabel).toBe('Fri 06 Jun')
  })

  it('returns an empty list for empty input', () => {
    expect(buildDailySummaries([])).toEqual([])
  })

  it('emits one summary per distinct calendar date', () => {
    const samples = [
      ...twoDaySamples(),
      createSample({ timestamp: at(2025, 6, 7, 0) }),
      createSample({ timestamp: at(2025, 6, 7, 21) }),
    ]

    const summaries = buildDailySummaries(samples)

    expect(summaries.map((summary) => summary.dateKey)).toEqual(['2025-06-05', '2025-06-06', '2025-06-07'])
  })

  it('collapses a single-sample day to equal min, max and mean', () => {
    const [summary] = buildDailySummaries([createSample({ temperature: 24.3 })])

    expect(summary?.minTemp).toBe(24.3)
    expect(summary?.maxTemp).toBe(24.3)
    expect(summary?.meanTemp).toBe(24.3)
  })

  it('orders output by date even when input is out of order', () => {
    const summaries = buildDailySummaries([...twoDaySamples()].reverse())

    expect(summaries.map((summary) => summary.dateKey)).toEqual(['2025-06-05', '2025-06-06'])
    expect(summaries[0]?.meanTemp).toBe(29.5)
  })

  it('treats a missing rain bucket as zero without dropping the sample', () => {
    const samples = [
      createSample({ timestamp: at(2025, 6, 5, 9), temperature: 20, rainVolume3h: 1.5 }),
      createSample({ timestamp: at(2025, 6, 5, 12), temperature: 22, rainVolume3h: undefined }),
    ]

    const [summary] = buildDailySummaries(samples)

    expect(summary?.totalRain).toBe(1.5)
    expect(summary?.sampleCount).toBe(2)
    expect(summary?.meanTemp).toBe(21)
  })

  it('keeps total rainfall equal across the daily split', () => {
    const samples = twoDaySamples()
    const inputTotal = samples.reduce((sum, sample) => sum + (sample.rainVolume3h ?? 0), 0)
    const dailyTotal = buildDailySummaries(samples).reduce((sum, summary) => sum + summary.totalRain, 0)

    expect(dailyTotal).toBeCloseTo(inputTotal, 10)
    expect(dailyTotal).toBeCloseTo(4, 10)
  })

  it('keeps the mean between the daily min and max', () => {
    const samples = Array.from({ length: 40 }, (_, index) =>
      createSample({
        timestamp: at(2025, 6, 5, 0) + index * 3 * 3_600,
        temperature: 18 + ((index * 7) % 13) - 0.25 * (index % 4),
      }),
    )

    const summaries = buildDailySummaries(samples)

    expect(summaries).toHaveLength(5)
    summaries.forEach((summary) => {
      expect(summary.minTemp).toBeLessThanOrEqual(summary.meanTemp)
      expect(summary.meanTemp).toBeLessThanOrEqual(summary.maxTemp)
    })
  })

  it('does not let float summation push the mean outside the day range', () => {
    const samples = [
      ...[9, 12, 15].map((hour) => createSample({ timestamp: at(2025, 6, 5, hour), temperature: 28.1, humidity: 28.1 })),
      ...[9, 12, 15].map((hour) => createSample({ timestamp: at(2025, 6, 6, hour), temperature: 0.1, humidity: 0.1 })),
    ]

    const [warm, cold] = buildDailySummaries(samples)

    expect(warm?.meanTemp).toBe(28.1)
    expect(warm?.maxTemp).toBe(28.1)
    expect(warm?.meanHumidity).toBe(28.1)
    expect(cold?.meanTemp).toBe(0.1)
    expect(cold?.minTemp).toBe(0.1)
    expect(cold?.meanHumidity).toBe(0.1)
  })

  it('returns identical output for repeated calls', () => {
    const samples = twoDaySamples()

    expect(buildDailySummaries(samples)).toEqual(buildDailySummaries(samples))
  })

  it('is unaffected by the order of same-day samples', () => {
    const samples = twoDaySamples()
    const shuffled = [samples[3], samples[0], samples[2], samples[1], samples[7], samples[5], samples[4], samples[6]]
      .filter((sample): sample is RawSample => sample !== undefined)

    const original = buildDailySummaries(samples)
    const reordered = buildDailySummaries(shuffled)

    reordered.forEach((summary, index) => {
      expect(summary.dateKey).toBe(original[index]?.dateKey)
      expect(summary.meanTemp).toBeCloseTo(original[index]?.meanTemp ?? Number.NaN, 10)
      expect(summary.minTemp).toBe(original[index]?.minTemp)
      expect(summary.maxTemp).toBe(original[index]?.maxTemp)
      expect(summary.totalRain).toBeCloseTo(original[index]?.totalRain ?? Number.NaN, 10)
    })
  })

  it('fails fast on a sample with a missing temperature', () => {
    const broken = { ...createSample(), temperature: undefined } as unknown as RawSample
    const samples = [createSample(), broken]

    expect(() => buildDailySummaries(samples)).toThrow(MalformedSampleError)
    try {
      buildDailySummaries(samples)
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedSampleError)
      expect((error as MalformedSampleError).index).toBe(1)
      expect((error as MalformedSampleError).record).toBe(broken)
    }
  })

  it('rejects negative rain volumes', () => {
    expect(() => buildDailySummaries([createSample({ rainVolume3h: -1 })])).toThrow(
      'Forecast sample #0 is malformed: rain volume must be a non-negative number',
    )
  })
})

describe('buildDetailWindow', () => {
  it('returns all samples when fewer than the limit exist', () => {
    const samples = twoDaySamples()

    const window = buildDetailWindow(samples, 12)

    expect(window).toHaveLength(8)
    expect(window).toEqual(samples)
  })

  it('defaults to the first twelve samples in input order', () => {
    const samples = Array.from({ length: 40 }, (_, index) =>
      createSample({ timestamp: at(2025, 6, 5, 0) + index * 3 * 3_600 }),
    )

    const window = buildDetailWindow(samples)

    expect(window).toHaveLength(12)
    expect(window[0]).toBe(samples[0])
    expect(window[11]).toBe(samples[11])
  })

  it('handles empty input and a zero limit', () => {
    expect(buildDetailWindow([], 12)).toEqual([])
    expect(buildDetailWindow(twoDaySamples(), 0)).toEqual([])
  })

  it('rejects negative or fractional limits', () => {
    expect(() => buildDetailWindow(twoDaySamples(), -1)).toThrow(RangeError)
    expect(() => buildDetailWindow(twoDaySamples(), 1.5)).toThrow(RangeError)
  })
})

describe('display formatting', () => {
  it('formats day labels with fixed English abbreviations', () => {
    expect(formatDisplayLabel(new Date(2025, 5, 5))).toBe('Thu 05 Jun')
    expect(formatDisplayLabel(new Date(2025, 11, 29))).toBe('Mon 29 Dec')
  })

  it('formats detail times on a 24-hour clock', () => {
    expect(formatDetailTime(at(2025, 6, 5, 9))).toBe('05 Jun 09:00')
    expect(formatDetailTime(at(2025, 1, 14, 21))).toBe('14 Jan 21:00')
  })

  it('keys samples by their local calendar date', () => {
    expect(toDateKey(at(2025, 6, 5, 0))).toBe('2025-06-05')
    expect(toDateKey(at(2025, 6, 5, 23))).toBe('2025-06-05')
  })

  it('projects samples into table rows with rain defaulted to zero', () => {
    const rows = toDetailRows([
      createSample({ timestamp: at(2025, 6, 5, 9), rainVolume3h: undefined, description: 'Light Rain' }),
    ])

    expect(rows).toEqual([
      {
        id: `sample-0-${at(2025, 6, 5, 9)}`,
        timeLabel: '05 Jun 09:00',
        temperature: 28,
        humidity: 60,
        windSpeed: 3.1,
        rain: 0,
        description: 'Light Rain',
      },
    ])
  })
})
