import type { CurveSnapshot, Frequency, SeriesLine } from '@/lib/schema/indicator'

export interface ChartRow {
  date: string
  [lineKey: string]: string | number | null
}

export const LINE_COLORS = ['#2563eb', '#dc2626', '#16a34a', '#9333ea', '#ea580c', '#0891b2', '#ca8a04', '#db2777', '#4b5563', '#65a30d', '#7c3aed']

/**
 * One row per date, one column per line. Missing values stay null so the
 * chart breaks the line there instead of joining across the gap.
 */
export function buildChartRows(lines: readonly SeriesLine[]): ChartRow[] {
  const axis = lines[0]?.observations ?? []
  return axis.map((obs, i) => {
    const row: ChartRow = { date: obs.date }
    for (const line of lines) row[line.key] = line.observations[i]?.value ?? null
    return row
  })
}

export interface CurveRow {
  maturity: string
  [snapshotKey: string]: string | number | null
}

export function buildCurveRows(snapshots: readonly CurveSnapshot[]): CurveRow[] {
  const maturities = [...new Set(snapshots.flatMap((s) => s.points.map((p) => p.maturity)))]
  return maturities.map((maturity) => {
    const row: CurveRow = { maturity }
    for (const snapshot of snapshots) {
      row[snapshot.key] = snapshot.points.find((p) => p.maturity === maturity)?.rate ?? null
    }
    return row
  })
}

export function dateTickPattern(frequency: Frequency): string {
  return frequency === 'd' ? 'MMM yy' : 'yyyy'
}
