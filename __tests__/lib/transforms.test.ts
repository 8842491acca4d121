import { describe, it, expect } from 'vitest'
import {
  alignObservations,
  clamp,
  lastChange,
  latestReported,
  percentChange,
  remapDates,
  round,
  toYearStart,
} from '@/lib/indicators/transforms'

describe('transforms', () => {
  it('rounds without producing negative zero', () => {
    expect(round(1.23456, 2)).toBe(1.23)
    expect(round(122.6, 0)).toBe(123)
    expect(Object.is(round(-0.001, 2), 0)).toBe(true)
  })

  it('clamps', () => {
    expect(clamp(70, 30, 65)).toBe(65)
    expect(clamp(10, 30, 65)).toBe(30)
    expect(clamp(51, 30, 65)).toBe(51)
  })

  it('aligns series on the union of dates with null where a series is silent', () => {
    const [a, b] = alignObservations([
      [
        { date: '2024-01-01', value: 1 },
        { date: '2024-03-01', value: 3 },
      ],
      [
        { date: '2024-02-01', value: 20 },
        { date: '2024-03-01', value: 30 },
      ],
    ])

    expect(a).toEqual([
      { date: '2024-01-01', value: 1 },
      { date: '2024-02-01', value: null },
      { date: '2024-03-01', value: 3 },
    ])
    expect(b).toEqual([
      { date: '2024-01-01', value: null },
      { date: '2024-02-01', value: 20 },
      { date: '2024-03-01', value: 30 },
    ])
  })

  it('measures change and percent change over reported values only', () => {
    const series = [
      { date: '2024-01-01', value: 100 },
      { date: '2024-02-01', value: 104 },
      { date: '2024-03-01', value: null },
      { date: '2024-04-01', value: 110 },
    ]

    expect(latestReported(series)).toEqual({ date: '2024-04-01', value: 110 })
    expect(lastChange(series, 2)).toBe(6)
    expect(percentChange(series, 2, 1)).toBe(10)
    expect(percentChange(series, 3, 1)).toBeNull()
  })

  it('returns null stats for a series with fewer than two reported values', () => {
    const series = [
      { date: '2024-01-01', value: null },
      { date: '2024-02-01', value: 5 },
    ]
    expect(lastChange(series, 1)).toBeNull()
    expect(latestReported([{ date: '2024-01-01', value: null }])).toBeNull()
  })

  it('remaps dates onto year starts, keeping the last value per year', () => {
    expect(
      remapDates(
        [
          { date: '2022-04-01', value: 118 },
          { date: '2022-10-01', value: 120 },
          { date: '2023-01-01', value: 122 },
        ],
        toYearStart
      )
    ).toEqual([
      { date: '2022-01-01', value: 120 },
      { date: '2023-01-01', value: 122 },
    ])
  })
})
