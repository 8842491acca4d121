import type { Frequency, IndicatorId } from '@/lib/schema/indicator'

export interface CatalogEntry {
  id: IndicatorId
  file: string
  title: string
  description: string
  frequency: Frequency
}

/**
 * Fixed set of published indicators, in dashboard order. The dashboard reads
 * exactly these files; the fetcher writes exactly these files.
 */
export const INDICATOR_CATALOG: readonly CatalogEntry[] = [
  {
    id: 'm2',
    file: 'm2.json',
    title: 'Global M2',
    description: 'US M2 scaled to a global estimate, plus broad money by country',
    frequency: 'm',
  },
  {
    id: 'fed_balance_sheet',
    file: 'fed_balance_sheet.json',
    title: 'Fed Balance Sheet',
    description: 'Total assets of the Federal Reserve (WALCL)',
    frequency: 'w',
  },
  {
    id: 'yield_curve',
    file: 'yield_curve.json',
    title: 'US Treasury Yield Curve',
    description: 'Constant-maturity yields, 1M to 30Y',
    frequency: 'd',
  },
  {
    id: 'nfci',
    file: 'nfci.json',
    title: 'Financial Conditions (NFCI)',
    description: 'Chicago Fed National Financial Conditions Index; negative is looser than average',
    frequency: 'w',
  },
  {
    id: 'rates',
    file: 'rates.json',
    title: 'Policy Rates',
    description: 'Central bank policy and short-term rates',
    frequency: 'm',
  },
  {
    id: 'debt_gdp',
    file: 'debt_gdp.json',
    title: 'Government Debt / GDP',
    description: 'General government debt as a share of GDP',
    frequency: 'a',
  },
  {
    id: 'pmi',
    file: 'pmi.json',
    title: 'Leading Indicator (PMI scale)',
    description: 'OECD composite leading indicator rescaled around 50',
    frequency: 'm',
  },
  {
    id: 'unemployment',
    file: 'unemployment.json',
    title: 'Unemployment Rate',
    description: 'Harmonised unemployment rate',
    frequency: 'm',
  },
]

export function getCatalogEntry(id: IndicatorId): CatalogEntry {
  const entry = INDICATOR_CATALOG.find((e) => e.id === id)
  if (!entry) throw new Error(`Unknown indicator: ${id}`)
  return entry
}
