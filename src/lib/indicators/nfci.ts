import type { IndicatorDocument, SignalStatus } from '@/lib/schema/indicator'
import { ValidationError } from '@/lib/utils/errors'
import { getCatalogEntry } from './catalog'
import { buildLine, createDocument, fetchSources, type BuildContext } from './sources'
import { mapValues, round } from './transforms'

export function classifyFinancialConditions(value: number): SignalStatus {
  if (value < -0.3) return 'loose'
  if (value < 0) return 'slightly_loose'
  if (value < 0.3) return 'slightly_tight'
  return 'tight'
}

export async function buildNfci(ctx: BuildContext): Promise<IndicatorDocument> {
  const entry = getCatalogEntry('nfci')
  const [nfci] = await fetchSources(ctx, [{ key: 'nfci', code: 'NFCI', label: 'NFCI', required: true }], {
    start: '2000-01-01',
    frequency: entry.frequency,
  })

  const line = buildLine(
    nfci.spec,
    mapValues(nfci.observations, (v) => round(v, 2)),
    { units: 'index', changeDigits: 2 }
  )
  if (!line.latest || line.latest.value === null) throw new ValidationError('NFCI has no reported value', 'NFCI')

  const current = line.latest.value
  return createDocument(
    {
      id: entry.id,
      title: entry.title,
      units: 'index',
      frequency: entry.frequency,
      lines: [line],
      signals: [{ key: 'nfci', label: 'Financial conditions', value: current, status: classifyFinancialConditions(current) }],
    },
    ctx.now
  )
}
