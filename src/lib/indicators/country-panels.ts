import type { Frequency, IndicatorDocument, IndicatorId } from '@/lib/schema/indicator'
import { getCatalogEntry } from './catalog'
import { CENTRAL_BANKS, COUNTRIES, type CountryCode } from './countries'
import { buildLine, createDocument, fetchSources, type BuildContext, type SourceSpec } from './sources'
import { alignObservations, clamp, mapValues, remapDates, round, toYearStart } from './transforms'

interface CountryPanelSpec {
  id: IndicatorId
  units: string
  start: string
  digits: number
  changeDigits: number
  codes: ReadonlyArray<readonly [CountryCode, string]>
  withBank?: boolean
  transform?: (value: number) => number
  normalizeDate?: (date: string) => string
}

function countrySources(spec: CountryPanelSpec): SourceSpec[] {
  return spec.codes.map(([country, code]) => ({
    key: country,
    code,
    label: COUNTRIES[country].country,
    meta: spec.withBank ? { ...COUNTRIES[country], bank: CENTRAL_BANKS[country] } : COUNTRIES[country],
  }))
}

/**
 * One line per economy on a shared date axis. Economies that fail to load are
 * dropped; the panel fails only when none load.
 */
async function buildCountryPanel(ctx: BuildContext, spec: CountryPanelSpec): Promise<IndicatorDocument> {
  const entry = getCatalogEntry(spec.id)
  const frequency: Frequency = entry.frequency
  const fetched = await fetchSources(ctx, countrySources(spec), { start: spec.start, frequency })

  const transform = spec.transform ?? ((v: number) => v)
  const series = fetched.map((s) => {
    const values = mapValues(s.observations, (v) => round(transform(v), spec.digits))
    return spec.normalizeDate ? remapDates(values, spec.normalizeDate) : values
  })
  const aligned = alignObservations(series)

  return createDocument(
    {
      id: entry.id,
      title: entry.title,
      units: spec.units,
      frequency,
      lines: fetched.map((s, i) =>
        buildLine(s.spec, aligned[i] ?? [], { units: spec.units, changeDigits: spec.changeDigits })
      ),
    },
    ctx.now
  )
}

/** OECD CLI is centred on 100; map it onto a PMI-like scale centred on 50. */
export function cliToPmi(cli: number): number {
  return clamp((cli - 100) * 5 + 50, 30, 65)
}

export const RATES_PANEL: CountryPanelSpec = {
  id: 'rates',
  units: 'percent',
  start: '2000-01-01',
  digits: 2,
  changeDigits: 2,
  withBank: true,
  codes: [
    ['us', 'DFEDTARU'],
    ['kr', 'IRSTCI01KRM156N'],
    ['eu', 'ECBMRRFR'],
    ['jp', 'IRSTCI01JPM156N'],
    ['cn', 'INTDSRCNM193N'],
  ],
}

export const DEBT_GDP_PANEL: CountryPanelSpec = {
  id: 'debt_gdp',
  units: 'percent_of_gdp',
  start: '2000-01-01',
  digits: 0,
  changeDigits: 0,
  normalizeDate: toYearStart,
  codes: [
    ['us', 'GFDEGDQ188S'],
    ['jp', 'GGGDTAJPA188N'],
    ['eu', 'GGGDTAEZA188N'],
    ['kr', 'GGGDTAKRA188N'],
    ['cn', 'GGGDTACNA188N'],
  ],
}

export const PMI_PANEL: CountryPanelSpec = {
  id: 'pmi',
  units: 'pmi',
  start: '2015-01-01',
  digits: 1,
  changeDigits: 1,
  transform: cliToPmi,
  codes: [
    ['us', 'USALOLITONOSTSAM'],
    ['jp', 'JPNLOLITONOSTSAM'],
    ['eu', 'EA19LOLITONOSTSAM'],
    ['kr', 'KORLOLITONOSTSAM'],
    ['cn', 'CHNLOLITONOSTSAM'],
  ],
}

export const UNEMPLOYMENT_PANEL: CountryPanelSpec = {
  id: 'unemployment',
  units: 'percent',
  start: '2000-01-01',
  digits: 1,
  changeDigits: 1,
  codes: [
    ['us', 'UNRATE'],
    ['kr', 'LRUN64TTKRM156S'],
    ['eu', 'LRHUTTTTEZM156S'],
    ['jp', 'LRUN64TTJPM156S'],
    ['cn', 'LRUN64TTCNM156S'],
  ],
}

export const buildRates = (ctx: BuildContext) => buildCountryPanel(ctx, RATES_PANEL)
export const buildDebtGdp = (ctx: BuildContext) => buildCountryPanel(ctx, DEBT_GDP_PANEL)
export const buildPmi = (ctx: BuildContext) => buildCountryPanel(ctx, PMI_PANEL)
export const buildUnemployment = (ctx: BuildContext) => buildCountryPanel(ctx, UNEMPLOYMENT_PANEL)
