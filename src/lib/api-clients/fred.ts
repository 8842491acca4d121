import { CONFIG } from '@/lib/config'
import { fetchWithRetry } from '@/lib/utils/retry'
import { APIError, ConfigError, ValidationError } from '@/lib/utils/errors'
import { createLogger, type Logger } from '@/lib/utils/logger'
import type { Observation } from '@/lib/schema/indicator'
import {
  FREDErrorSchema,
  FREDResponseSchema,
  type FREDSeries,
  type SeriesRequest,
  type SeriesSource,
} from './types'

export interface FREDClientOptions {
  apiKey?: string
  baseUrl?: string
  fetchImpl?: typeof fetch
  timeoutMs?: number
  maxRetries?: number
  retryBaseDelayMs?: number
  logger?: Logger
}

export class FREDAPIClient implements SeriesSource {
  private readonly apiKey: string | undefined
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch
  private readonly timeoutMs: number
  private readonly maxRetries: number
  private readonly retryBaseDelayMs: number
  private readonly logger: Logger

  constructor(options: FREDClientOptions = {}) {
    const trimmed = options.apiKey?.trim()
    this.apiKey = trimmed || undefined
    this.baseUrl = options.baseUrl ?? CONFIG.api.fred.baseUrl
    this.fetchImpl = options.fetchImpl ?? fetch
    this.timeoutMs = options.timeoutMs ?? CONFIG.api.fred.timeoutMs
    this.maxRetries = options.maxRetries ?? CONFIG.api.fred.maxRetries
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? CONFIG.api.fred.retryBaseDelayMs
    this.logger = options.logger ?? createLogger('fred')
  }

  private requireApiKey(): string {
    if (!this.apiKey) {
      throw new ConfigError('FRED_API_KEY is required')
    }
    return this.apiKey
  }

  private async fetchSeriesRaw(seriesId: string, request: SeriesRequest): Promise<FREDSeries> {
    const apiKey = this.requireApiKey()
    const url = new URL(`${this.baseUrl}/series/observations`)
    url.searchParams.set('series_id', seriesId)
    url.searchParams.set('api_key', apiKey)
    url.searchParams.set('file_type', 'json')
    url.searchParams.set('observation_start', request.start)
    url.searchParams.set('sort_order', 'asc')
    if (request.frequency) url.searchParams.set('frequency', request.frequency)

    return fetchWithRetry(
      async () => {
        const res = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(this.timeoutMs) })
        const text = await res.text()
        if (!res.ok) {
          const detail = describeErrorBody(text)
          throw new APIError(`FRED ${seriesId} returned HTTP ${res.status}${detail ? `: ${detail}` : ''}`, res.status, 'FRED')
        }

        const parsed = FREDResponseSchema.safeParse(parseJson(text))
        if (!parsed.success) {
          const issue = parsed.error.issues[0]
          throw new ValidationError(`Invalid FRED response for ${seriesId}: ${issue?.message ?? 'unexpected payload'}`, 'observations')
        }
        return parsed.data.observations
      },
      { maxRetries: this.maxRetries, baseDelayMs: this.retryBaseDelayMs, logger: this.logger }
    )
  }

  async getObservations(seriesId: string, request: SeriesRequest): Promise<Observation[]> {
    const raw = await this.fetchSeriesRaw(seriesId, request)
    return normalizeObservations(raw)
  }
}

/**
 * FRED reports missing data as "."; those become null. Output is date-ascending
 * with one entry per date (a repeated date keeps its last value).
 */
export function normalizeObservations(raw: FREDSeries): Observation[] {
  const byDate = new Map<string, number | null>()
  for (const o of raw) byDate.set(o.date, parseFredValue(o.value))
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, value]) => ({ date, value }))
}

export function parseFredValue(value: string): number | null {
  if (value === '.' || value.trim() === '') return null
  const n = Number(value)
  return Number.isFinite(n) ? n : null
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function describeErrorBody(text: string): string {
  const parsed = FREDErrorSchema.safeParse(parseJson(text))
  if (parsed.success) return parsed.data.error_message
  return text.slice(0, 200)
}
