import { z } from 'zod'

export const INDICATOR_IDS = [
  'm2',
  'fed_balance_sheet',
  'yield_curve',
  'nfci',
  'rates',
  'debt_gdp',
  'pmi',
  'unemployment',
] as const

export const IndicatorIdSchema = z.enum(INDICATOR_IDS)
export type IndicatorId = z.infer<typeof IndicatorIdSchema>

export const FrequencySchema = z.enum(['d', 'w', 'm', 'q', 'a'])
export type Frequency = z.infer<typeof FrequencySchema>

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')

export const ObservationSchema = z.object({
  date: IsoDateSchema,
  value: z.number().finite().nullable(),
})

export type Observation = z.infer<typeof ObservationSchema>

export const CountryMetaSchema = z.object({
  country: z.string(),
  flag: z.string(),
  bank: z.string().optional(),
})

export type CountryMeta = z.infer<typeof CountryMetaSchema>

export const SeriesLineSchema = z.object({
  key: z.string().min(1),
  label: z.string(),
  source: z.string().min(1),
  units: z.string(),
  observations: z.array(ObservationSchema),
  latest: ObservationSchema.nullable(),
  change: z.number().finite().nullable(),
  yoyPct: z.number().finite().nullable(),
  meta: CountryMetaSchema.optional(),
})

export type SeriesLine = z.infer<typeof SeriesLineSchema>

export const SignalStatusSchema = z.enum([
  'INVERTED',
  'FLAT',
  'NORMAL',
  'loose',
  'slightly_loose',
  'slightly_tight',
  'tight',
  'none',
])

export type SignalStatus = z.infer<typeof SignalStatusSchema>

export const SignalSchema = z.object({
  key: z.string().min(1),
  label: z.string(),
  value: z.number().finite(),
  status: SignalStatusSchema,
})

export type Signal = z.infer<typeof SignalSchema>

export const CurveSnapshotSchema = z.object({
  key: z.enum(['current', 'one_month_ago', 'one_year_ago']),
  date: IsoDateSchema,
  points: z.array(
    z.object({
      maturity: z.string(),
      rate: z.number().finite().nullable(),
    })
  ),
})

export type CurveSnapshot = z.infer<typeof CurveSnapshotSchema>

export const IndicatorDocumentSchema = z
  .object({
    id: IndicatorIdSchema,
    title: z.string(),
    lastUpdated: z.string().datetime(),
    units: z.string(),
    frequency: FrequencySchema,
    sources: z.array(z.string().min(1)).min(1),
    lines: z.array(SeriesLineSchema).min(1),
    signals: z.array(SignalSchema),
    curve: z.array(CurveSnapshotSchema).optional(),
  })
  .superRefine((doc, ctx) => {
    const axis = doc.lines[0]?.observations.map((o) => o.date) ?? []

    doc.lines.forEach((line, lineIndex) => {
      line.observations.forEach((obs, i) => {
        const prev = line.observations[i - 1]
        if (prev && prev.date >= obs.date) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['lines', lineIndex, 'observations', i, 'date'],
            message: `${line.key}: ${obs.date} is not after ${prev.date}`,
          })
        }
      })

      const aligned = line.observations.length === axis.length && line.observations.every((o, i) => o.date === axis[i])
      if (!aligned) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['lines', lineIndex, 'observations'],
          message: `${line.key}: dates are not aligned with ${doc.lines[0]?.key}`,
        })
      }
    })

    const expectedSources = uniqueSources(doc.lines)
    const sameSources =
      expectedSources.length === doc.sources.length && expectedSources.every((code, i) => code === doc.sources[i])
    if (!sameSources) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sources'],
        message: `sources must list ${expectedSources.join(', ')}`,
      })
    }
  })

export type IndicatorDocument = z.infer<typeof IndicatorDocumentSchema>

export function uniqueSources(lines: ReadonlyArray<Pick<SeriesLine, 'source'>>): string[] {
  return [...new Set(lines.map((l) => l.source))]
}
