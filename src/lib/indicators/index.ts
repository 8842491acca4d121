import type { IndicatorDocument, IndicatorId } from '@/lib/schema/indicator'
import { INDICATOR_CATALOG, type CatalogEntry } from './catalog'
import { buildDebtGdp, buildPmi, buildRates, buildUnemployment } from './country-panels'
import { buildFedBalanceSheet } from './fed-balance-sheet'
import { buildM2 } from './m2'
import { buildNfci } from './nfci'
import type { BuildContext } from './sources'
import { buildYieldCurve } from './yield-curve'

export interface IndicatorDefinition extends CatalogEntry {
  build(ctx: BuildContext): Promise<IndicatorDocument>
}

const BUILDERS: Record<IndicatorId, (ctx: BuildContext) => Promise<IndicatorDocument>> = {
  m2: buildM2,
  fed_balance_sheet: buildFedBalanceSheet,
  yield_curve: buildYieldCurve,
  nfci: buildNfci,
  rates: buildRates,
  debt_gdp: buildDebtGdp,
  pmi: buildPmi,
  unemployment: buildUnemployment,
}

export const INDICATORS: readonly IndicatorDefinition[] = INDICATOR_CATALOG.map((entry) => ({
  ...entry,
  build: BUILDERS[entry.id],
}))

export { INDICATOR_CATALOG, getCatalogEntry } from './catalog'
export type { CatalogEntry } from './catalog'
export type { BuildContext } from './sources'
