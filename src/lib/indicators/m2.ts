import type { IndicatorDocument } from '@/lib/schema/indicator'
import { getErrorMessage } from '@/lib/utils/errors'
import { getCatalogEntry } from './catalog'
import { COUNTRIES } from './countries'
import { buildLine, createDocument, fetchSources, type BuildContext, type SourceSpec } from './sources'
import { alignObservations, mapValues, round } from './transforms'

const START = '2015-01-01'
const US_M2 = 'M2SL'
// US is roughly 23% of global broad money
const GLOBAL_MULTIPLIER = 4.3

const COUNTRY_SOURCES: readonly SourceSpec[] = [
  { key: 'eu', code: 'MABMM301EZM189S', label: 'Euro Area', meta: COUNTRIES.eu },
  { key: 'jp', code: 'MABMM301JPM189S', label: 'Japan', meta: COUNTRIES.jp },
  { key: 'kr', code: 'MABMM301KRM189S', label: 'South Korea', meta: COUNTRIES.kr },
]

/**
 * Global M2: a world total extrapolated from US M2SL (billions of USD) plus
 * broad money per economy in national currency.
 */
export async function buildM2(ctx: BuildContext): Promise<IndicatorDocument> {
  const entry = getCatalogEntry('m2')
  const request = { start: START, frequency: entry.frequency }

  const [us] = await fetchSources(ctx, [{ key: 'us', code: US_M2, label: 'United States', required: true }], request)
  const others = await fetchSources(ctx, COUNTRY_SOURCES, request).catch((error: unknown) => {
    ctx.logger.warn(`No country broad money available: ${getErrorMessage(error)}`)
    return []
  })

  const trillions = mapValues(us.observations, (v) => v / 1000)
  const total = mapValues(trillions, (v) => round(v * GLOBAL_MULTIPLIER, 1))
  const usLine = mapValues(trillions, (v) => round(v, 2))
  const countryLines = others.map((s) => mapValues(s.observations, (v) => round(v, 2)))

  const [alignedTotal = [], alignedUs = [], ...alignedCountries] = alignObservations([total, usLine, ...countryLines])

  const lines = [
    buildLine({ key: 'total', code: US_M2, label: 'Global (est.)' }, alignedTotal, {
      units: 'trillion_usd',
      changeDigits: 1,
      yoyPeriods: 12,
    }),
    buildLine({ ...us.spec, meta: COUNTRIES.us }, alignedUs, { units: 'trillion_usd', changeDigits: 2, yoyPeriods: 12 }),
    ...others.map((s, i) =>
      buildLine(s.spec, alignedCountries[i] ?? [], { units: 'national_currency', changeDigits: 2, yoyPeriods: 12 })
    ),
  ]

  return createDocument(
    { id: entry.id, title: entry.title, units: 'trillion_usd', frequency: entry.frequency, lines },
    ctx.now
  )
}
