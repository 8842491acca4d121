import type { IndicatorDocument } from '@/lib/schema/indicator'
import { getCatalogEntry } from './catalog'
import { buildLine, createDocument, fetchSources, type BuildContext } from './sources'
import { mapValues, round } from './transforms'

export async function buildFedBalanceSheet(ctx: BuildContext): Promise<IndicatorDocument> {
  const entry = getCatalogEntry('fed_balance_sheet')
  const [walcl] = await fetchSources(
    ctx,
    [{ key: 'walcl', code: 'WALCL', label: 'Total assets', required: true }],
    { start: '2008-01-01', frequency: entry.frequency }
  )

  // millions of USD -> trillions
  const observations = mapValues(walcl.observations, (v) => round(v / 1_000_000, 2))
  const line = buildLine(walcl.spec, observations, { units: 'trillion_usd', changeDigits: 3, yoyPeriods: 52 })

  return createDocument(
    {
      id: entry.id,
      title: entry.title,
      units: 'trillion_usd',
      frequency: entry.frequency,
      lines: [line],
      signals: [{ key: 'weekly_change', label: 'Weekly change', value: line.change ?? 0, status: 'none' }],
    },
    ctx.now
  )
}
