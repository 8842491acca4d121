import type { Observation } from '@/lib/schema/indicator'

export function round(value: number, digits: number): number {
  const factor = 10 ** digits
  const rounded = Math.round(value * factor) / factor
  // avoid -0 in the JSON output
  return rounded === 0 ? 0 : rounded
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

export function mapValues(observations: Observation[], fn: (value: number) => number): Observation[] {
  return observations.map((o) => ({ date: o.date, value: o.value === null ? null : fn(o.value) }))
}

export function reported(observations: Observation[]): Array<{ date: string; value: number }> {
  const out: Array<{ date: string; value: number }> = []
  for (const o of observations) {
    if (o.value !== null) out.push({ date: o.date, value: o.value })
  }
  return out
}

export function latestReported(observations: Observation[]): Observation | null {
  for (let i = observations.length - 1; i >= 0; i--) {
    const o = observations[i]
    if (o && o.value !== null) return { date: o.date, value: o.value }
  }
  return null
}

/** Difference between the last two reported values. */
export function lastChange(observations: Observation[], digits: number): number | null {
  const values = reported(observations)
  const last = values.at(-1)
  const prev = values.at(-2)
  if (!last || !prev) return null
  return round(last.value - prev.value, digits)
}

/** Percent change of the last reported value against the one `periods` reported values earlier. */
export function percentChange(observations: Observation[], periods: number, digits: number): number | null {
  const values = reported(observations)
  const last = values.at(-1)
  const base = values.at(-1 - periods)
  if (!last || !base || base.value === 0) return null
  return round(((last.value - base.value) / base.value) * 100, digits)
}

/**
 * Re-keys observations (e.g. to the first day of the year), keeping the last
 * value for any date that collapses onto another, ascending.
 */
export function remapDates(observations: Observation[], fn: (date: string) => string): Observation[] {
  const byDate = new Map<string, number | null>()
  for (const o of observations) byDate.set(fn(o.date), o.value)
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, value]) => ({ date, value }))
}

export function toYearStart(date: string): string {
  return `${date.slice(0, 4)}-01-01`
}

/**
 * Puts every series on the union of their dates. A series with nothing for a
 * date gets null there; nothing is carried forward.
 */
export function alignObservations(series: Observation[][]): Observation[][] {
  const dates = [...new Set(series.flatMap((s) => s.map((o) => o.date)))].sort()
  return series.map((s) => {
    const byDate = new Map(s.map((o) => [o.date, o.value] as const))
    return dates.map((date) => ({ date, value: byDate.get(date) ?? null }))
  })
}
