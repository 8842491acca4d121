import type { CurveSnapshot, IndicatorDocument, Signal, SignalStatus } from '@/lib/schema/indicator'
import { ValidationError } from '@/lib/utils/errors'
import { getCatalogEntry } from './catalog'
import { buildLine, createDocument, fetchSources, type BuildContext, type FetchedSource, type SourceSpec } from './sources'
import { alignObservations, reported, round } from './transforms'

export const MATURITIES: readonly SourceSpec[] = [
  { key: '1M', code: 'DGS1MO', label: '1M' },
  { key: '3M', code: 'DGS3MO', label: '3M' },
  { key: '6M', code: 'DGS6MO', label: '6M' },
  { key: '1Y', code: 'DGS1', label: '1Y' },
  { key: '2Y', code: 'DGS2', label: '2Y' },
  { key: '3Y', code: 'DGS3', label: '3Y' },
  { key: '5Y', code: 'DGS5', label: '5Y' },
  { key: '7Y', code: 'DGS7', label: '7Y' },
  { key: '10Y', code: 'DGS10', label: '10Y' },
  { key: '20Y', code: 'DGS20', label: '20Y' },
  { key: '30Y', code: 'DGS30', label: '30Y' },
]

// Trading days, counted in reported observations
const ONE_MONTH_BACK = 22
const ONE_YEAR_BACK = 252

export function classifySpread(spread: number): SignalStatus {
  if (spread < -0.1) return 'INVERTED'
  if (spread < 0.1) return 'FLAT'
  return 'NORMAL'
}

/**
 * Curve as of `back` reported observations before the latest one, per maturity.
 * The snapshot carries the date of the reference maturity (10Y when available).
 */
export function snapshotAt(key: CurveSnapshot['key'], sources: FetchedSource[], back: number): CurveSnapshot {
  const pick = (s: FetchedSource): { date: string; value: number } | undefined => {
    const values = reported(s.observations)
    return values[Math.max(0, values.length - 1 - back)]
  }

  const reference = sources.find((s) => s.spec.key === '10Y') ?? sources[0]
  const anchor = reference ? pick(reference) : undefined
  if (!anchor) throw new ValidationError('Yield curve has no reported rates')

  return {
    key,
    date: anchor.date,
    points: sources.map((s) => ({ maturity: s.spec.key, rate: pick(s)?.value ?? null })),
  }
}

function spreadSignal(key: string, label: string, rates: Map<string, number | null>, long: string, short: string): Signal {
  // a missing leg counts as zero
  const value = round((rates.get(long) ?? 0) - (rates.get(short) ?? 0), 2)
  return { key, label, value, status: classifySpread(value) }
}

export async function buildYieldCurve(ctx: BuildContext): Promise<IndicatorDocument> {
  const entry = getCatalogEntry('yield_curve')
  const sources = await fetchSources(ctx, MATURITIES, { start: '2023-01-01' })

  const aligned = alignObservations(sources.map((s) => s.observations))
  const lines = sources.map((s, i) => buildLine(s.spec, aligned[i] ?? [], { units: 'percent', changeDigits: 2 }))

  const current = snapshotAt('current', sources, 0)
  const curve = [current, snapshotAt('one_month_ago', sources, ONE_MONTH_BACK), snapshotAt('one_year_ago', sources, ONE_YEAR_BACK)]
  const rates = new Map(current.points.map((p) => [p.maturity, p.rate] as const))

  return createDocument(
    {
      id: entry.id,
      title: entry.title,
      units: 'percent',
      frequency: entry.frequency,
      lines,
      curve,
      signals: [
        spreadSignal('2s10s', '10Y - 2Y', rates, '10Y', '2Y'),
        spreadSignal('3m10y', '10Y - 3M', rates, '10Y', '3M'),
      ],
    },
    ctx.now
  )
}
