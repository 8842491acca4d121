import type { SeriesRequest, SeriesSource } from '@/lib/api-clients/types'
import type {
  CountryMeta,
  CurveSnapshot,
  Frequency,
  IndicatorDocument,
  IndicatorId,
  Observation,
  SeriesLine,
  Signal,
} from '@/lib/schema/indicator'
import { uniqueSources } from '@/lib/schema/indicator'
import { getErrorMessage, ValidationError } from '@/lib/utils/errors'
import type { Logger } from '@/lib/utils/logger'
import { lastChange, latestReported, percentChange } from './transforms'

export interface BuildContext {
  client: SeriesSource
  now: Date
  logger: Logger
}

export interface SourceSpec {
  key: string
  code: string
  label: string
  /** A required source failing fails the whole indicator. */
  required?: boolean
  meta?: CountryMeta
}

export interface FetchedSource {
  spec: SourceSpec
  observations: Observation[]
}

/**
 * Fetches each source in order. Optional sources that fail are logged and left
 * out; the indicator fails when a required source fails or nothing came back.
 * A source with no reported value at all counts as a failure.
 */
export async function fetchSources(
  ctx: BuildContext,
  specs: readonly SourceSpec[],
  request: SeriesRequest
): Promise<FetchedSource[]> {
  const fetched: FetchedSource[] = []
  let firstError: unknown

  for (const spec of specs) {
    try {
      const observations = await ctx.client.getObservations(spec.code, request)
      if (!observations.some((o) => o.value !== null)) {
        throw new ValidationError(`${spec.code} returned no numeric observations`, spec.code)
      }
      fetched.push({ spec, observations })
    } catch (error) {
      if (spec.required) throw error
      firstError ??= error
      ctx.logger.warn(`${spec.label} (${spec.code}) skipped: ${getErrorMessage(error)}`)
    }
  }

  if (fetched.length === 0) {
    throw firstError instanceof Error ? firstError : new ValidationError('No source series could be fetched')
  }
  return fetched
}

export interface LineOptions {
  units: string
  changeDigits: number
  /** Reported periods back for the year-over-year figure; omitted means no yoy. */
  yoyPeriods?: number
}

export function buildLine(spec: SourceSpec, observations: Observation[], options: LineOptions): SeriesLine {
  return {
    key: spec.key,
    label: spec.label,
    source: spec.code,
    units: options.units,
    observations,
    latest: latestReported(observations),
    change: lastChange(observations, options.changeDigits),
    yoyPct: options.yoyPeriods ? percentChange(observations, options.yoyPeriods, 1) : null,
    ...(spec.meta ? { meta: spec.meta } : {}),
  }
}

export interface DocumentParts {
  id: IndicatorId
  title: string
  units: string
  frequency: Frequency
  lines: SeriesLine[]
  signals?: Signal[]
  curve?: CurveSnapshot[]
}

export function createDocument(parts: DocumentParts, now: Date): IndicatorDocument {
  return {
    id: parts.id,
    title: parts.title,
    lastUpdated: now.toISOString(),
    units: parts.units,
    frequency: parts.frequency,
    sources: uniqueSources(parts.lines),
    lines: parts.lines,
    signals: parts.signals ?? [],
    ...(parts.curve ? { curve: parts.curve } : {}),
  }
}
