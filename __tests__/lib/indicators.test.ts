import { describe, it, expect } from 'vitest'
import { buildDebtGdp, buildPmi, buildRates, buildUnemployment, cliToPmi } from '@/lib/indicators/country-panels'
import { buildFedBalanceSheet } from '@/lib/indicators/fed-balance-sheet'
import { buildM2 } from '@/lib/indicators/m2'
import { buildNfci, classifyFinancialConditions } from '@/lib/indicators/nfci'
import { buildYieldCurve, classifySpread } from '@/lib/indicators/yield-curve'
import { IndicatorDocumentSchema } from '@/lib/schema/indicator'
import { APIError } from '@/lib/utils/errors'
import { daily, FakeSeriesSource, monthly, silentLogger } from '../helpers/fake-source'

const now = new Date('2024-06-01T06:00:00.000Z')
const ctx = (client: FakeSeriesSource) => ({ client, now, logger: silentLogger })

describe('Global M2', () => {
  const m2sl = monthly(
    '2023-01',
    Array.from({ length: 13 }, (_, i) => 20000 + i * 100)
  )

  it('extrapolates a global total from US M2 and adds the economies that loaded', async () => {
    const client = new FakeSeriesSource({
      M2SL: m2sl,
      MABMM301EZM189S: new APIError('FRED MABMM301EZM189S returned HTTP 500', 500, 'FRED'),
      MABMM301JPM189S: monthly('2023-12', [1250.456, 1260.004]),
    })

    const doc = await buildM2(ctx(client))

    expect(IndicatorDocumentSchema.safeParse(doc).success).toBe(true)
    expect(doc.lastUpdated).toBe('2024-06-01T06:00:00.000Z')
    expect(doc.lines.map((l) => l.key)).toEqual(['total', 'us', 'jp'])
    expect(doc.sources).toEqual(['M2SL', 'MABMM301JPM189S'])

    const [total, us, jp] = doc.lines
    expect(total?.latest).toEqual({ date: '2024-01-01', value: 91.2 })
    expect(total?.observations[0]).toEqual({ date: '2023-01-01', value: 86 })
    expect(total?.change).toBe(0.5)
    expect(total?.yoyPct).toBe(6)
    expect(us?.latest).toEqual({ date: '2024-01-01', value: 21.2 })
    expect(us?.yoyPct).toBe(6)
    expect(us?.meta).toEqual({ country: 'United States', flag: '🇺🇸' })
    expect(jp?.observations).toHaveLength(13)
    expect(jp?.observations[0]).toEqual({ date: '2023-01-01', value: null })
    expect(jp?.latest).toEqual({ date: '2024-01-01', value: 1260 })
    expect(jp?.units).toBe('national_currency')
  })

  it('requests monthly data from 2015 and fetches M2SL only once', async () => {
    const client = new FakeSeriesSource({ M2SL: m2sl })
    await buildM2(ctx(client))

    expect(client.calls.filter((c) => c.seriesId === 'M2SL')).toHaveLength(1)
    expect(client.calls[0]?.request).toEqual({ start: '2015-01-01', frequency: 'm' })
  })

  it('fails when US M2 cannot be fetched', async () => {
    const client = new FakeSeriesSource({ MABMM301JPM189S: monthly('2023-12', [1, 2]) })
    await expect(buildM2(ctx(client))).rejects.toThrow('FRED M2SL returned HTTP 400')
  })
})

describe('Fed balance sheet', () => {
  it('converts millions to trillions and reports the weekly change', async () => {
    const client = new FakeSeriesSource({
      WALCL: [
        { date: '2024-01-03', value: 7_000_000 },
        { date: '2024-01-10', value: 7_012_345 },
      ],
    })

    const doc = await buildFedBalanceSheet(ctx(client))

    expect(doc.lines[0]?.observations).toEqual([
      { date: '2024-01-03', value: 7 },
      { date: '2024-01-10', value: 7.01 },
    ])
    expect(doc.signals).toEqual([{ key: 'weekly_change', label: 'Weekly change', value: 0.01, status: 'none' }])
    expect(client.calls[0]?.request).toEqual({ start: '2008-01-01', frequency: 'w' })
  })
})

describe('NFCI', () => {
  it('classifies financial conditions at the thresholds', () => {
    expect(classifyFinancialConditions(-0.31)).toBe('loose')
    expect(classifyFinancialConditions(-0.3)).toBe('slightly_loose')
    expect(classifyFinancialConditions(0)).toBe('slightly_tight')
    expect(classifyFinancialConditions(0.3)).toBe('tight')
  })

  it('rounds values and keeps gaps', async () => {
    const client = new FakeSeriesSource({
      NFCI: [
        { date: '2024-01-05', value: -0.5123 },
        { date: '2024-01-12', value: null },
        { date: '2024-01-19', value: 0.1049 },
      ],
    })

    const doc = await buildNfci(ctx(client))

    expect(doc.lines[0]?.observations).toEqual([
      { date: '2024-01-05', value: -0.51 },
      { date: '2024-01-12', value: null },
      { date: '2024-01-19', value: 0.1 },
    ])
    expect(doc.signals).toEqual([{ key: 'nfci', label: 'Financial conditions', value: 0.1, status: 'slightly_tight' }])
  })

  it('fails when every observation is missing', async () => {
    const client = new FakeSeriesSource({ NFCI: [{ date: '2024-01-05', value: null }] })
    await expect(buildNfci(ctx(client))).rejects.toThrow('NFCI returned no numeric observations')
  })
})

describe('Yield curve', () => {
  const tenYear = daily('2024-01-01', [...Array.from({ length: 24 }, () => 4), 4.2])
  const twoYear = daily(
    '2024-01-01',
    Array.from({ length: 25 }, (_, i) => (i === 10 ? null : 4.5))
  )
  const threeMonth = daily('2024-01-01', Array.from({ length: 25 }, () => 5))

  it('classifies spreads', () => {
    expect(classifySpread(-0.11)).toBe('INVERTED')
    expect(classifySpread(-0.1)).toBe('FLAT')
    expect(classifySpread(0.1)).toBe('NORMAL')
  })

  it('builds snapshots and spreads from the maturities that loaded', async () => {
    const client = new FakeSeriesSource({ DGS3MO: threeMonth, DGS2: twoYear, DGS10: tenYear })

    const doc = await buildYieldCurve(ctx(client))

    expect(IndicatorDocumentSchema.safeParse(doc).success).toBe(true)
    expect(doc.lines.map((l) => l.key)).toEqual(['3M', '2Y', '10Y'])
    expect(doc.lines[1]?.observations[10]).toEqual({ date: '2024-01-11', value: null })
    expect(doc.curve).toEqual([
      {
        key: 'current',
        date: '2024-01-25',
        points: [
          { maturity: '3M', rate: 5 },
          { maturity: '2Y', rate: 4.5 },
          { maturity: '10Y', rate: 4.2 },
        ],
      },
      {
        key: 'one_month_ago',
        date: '2024-01-03',
        points: [
          { maturity: '3M', rate: 5 },
          { maturity: '2Y', rate: 4.5 },
          { maturity: '10Y', rate: 4 },
        ],
      },
      {
        key: 'one_year_ago',
        date: '2024-01-01',
        points: [
          { maturity: '3M', rate: 5 },
          { maturity: '2Y', rate: 4.5 },
          { maturity: '10Y', rate: 4 },
        ],
      },
    ])
    expect(doc.signals).toEqual([
      { key: '2s10s', label: '10Y - 2Y', value: -0.3, status: 'INVERTED' },
      { key: '3m10y', label: '10Y - 3M', value: -0.8, status: 'INVERTED' },
    ])
    expect(client.calls[0]?.request).toEqual({ start: '2023-01-01' })
  })
})

describe('Country panels', () => {
  it('maps the OECD leading indicator onto a PMI scale', () => {
    expect(cliToPmi(101)).toBe(55)
    expect(cliToPmi(96)).toBe(30)
    expect(cliToPmi(104)).toBe(65)
  })

  it('builds the PMI panel from the economies that loaded', async () => {
    const client = new FakeSeriesSource({
      USALOLITONOSTSAM: monthly('2024-01', [100.4, 100.6]),
      JPNLOLITONOSTSAM: new APIError('FRED JPNLOLITONOSTSAM returned HTTP 500', 500, 'FRED'),
    })

    const doc = await buildPmi(ctx(client))

    expect(doc.sources).toEqual(['USALOLITONOSTSAM'])
    expect(doc.lines[0]?.observations).toEqual([
      { date: '2024-01-01', value: 52 },
      { date: '2024-02-01', value: 53 },
    ])
    expect(doc.lines[0]?.change).toBe(1)
    expect(client.calls.map((c) => c.seriesId)).toEqual([
      'USALOLITONOSTSAM',
      'JPNLOLITONOSTSAM',
      'EA19LOLITONOSTSAM',
      'KORLOLITONOSTSAM',
      'CHNLOLITONOSTSAM',
    ])
  })

  it('puts annual debt ratios on year starts and aligns economies', async () => {
    const client = new FakeSeriesSource({
      GFDEGDQ188S: [
        { date: '2022-04-01', value: 120.4 },
        { date: '2023-04-01', value: 122.6 },
      ],
      GGGDTAJPA188N: [{ date: '2023-01-01', value: 255.2 }],
    })

    const doc = await buildDebtGdp(ctx(client))

    expect(doc.lines.map((l) => [l.key, l.observations])).toEqual([
      [
        'us',
        [
          { date: '2022-01-01', value: 120 },
          { date: '2023-01-01', value: 123 },
        ],
      ],
      [
        'jp',
        [
          { date: '2022-01-01', value: null },
          { date: '2023-01-01', value: 255 },
        ],
      ],
    ])
    expect(doc.lines[0]?.change).toBe(3)
    expect(client.calls[0]?.request).toEqual({ start: '2000-01-01', frequency: 'a' })
  })

  it('labels policy rates with their central bank', async () => {
    const client = new FakeSeriesSource({ DFEDTARU: monthly('2024-01', [5.5, 5.5]), ECBMRRFR: monthly('2024-01', [4.5, 4.25]) })

    const doc = await buildRates(ctx(client))

    expect(doc.lines.map((l) => l.meta)).toEqual([
      { country: 'United States', flag: '🇺🇸', bank: 'Fed' },
      { country: 'Euro Area', flag: '🇪🇺', bank: 'ECB' },
    ])
    expect(doc.lines[1]?.change).toBe(-0.25)
  })

  it('fails when no economy loads', async () => {
    const client = new FakeSeriesSource({})
    await expect(buildUnemployment(ctx(client))).rejects.toBeInstanceOf(APIError)
  })
})
