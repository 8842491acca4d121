import type { SeriesSource } from '@/lib/api-clients/types'
import { INDICATORS, type IndicatorDefinition } from '@/lib/indicators'
import type { IndicatorId } from '@/lib/schema/indicator'
import { writeIndicatorDocument, type WrittenArtifact } from '@/lib/storage/json-writer'
import { getErrorMessage, isAuthError } from '@/lib/utils/errors'
import { createLogger, type Logger } from '@/lib/utils/logger'

export interface CollectOptions {
  client: SeriesSource
  dataDir: string
  indicators?: readonly IndicatorDefinition[]
  only?: readonly IndicatorId[]
  now?: () => Date
  logger?: Logger
}

export type IndicatorOutcome =
  | { id: IndicatorId; status: 'written'; artifact: WrittenArtifact }
  | { id: IndicatorId; status: 'failed'; error: string }

export interface CollectionReport {
  startedAt: string
  durationMs: number
  outcomes: IndicatorOutcome[]
  written: WrittenArtifact[]
  failed: IndicatorId[]
}

/**
 * Builds and writes every indicator in order. A failure is logged and
 * recorded for that indicator only; its previous file stays in place.
 */
export async function collectIndicators(options: CollectOptions): Promise<CollectionReport> {
  const { client, dataDir, indicators = INDICATORS, only, now = () => new Date() } = options
  const logger = options.logger ?? createLogger('fetch')
  const loggerFor = (id: IndicatorId) => options.logger ?? createLogger(`fetch:${id}`)
  const started = now()
  const startTime = Date.now()
  const selected = only ? indicators.filter((d) => only.includes(d.id)) : indicators

  const outcomes: IndicatorOutcome[] = []
  for (const definition of selected) {
    logger.info(`Fetching ${definition.title}...`)
    try {
      const doc = await definition.build({ client, now: started, logger: loggerFor(definition.id) })
      const artifact = await writeIndicatorDocument(dataDir, definition.file, doc)
      logger.info(`${definition.file} saved (${artifact.bytes} bytes)`)
      outcomes.push({ id: definition.id, status: 'written', artifact })
    } catch (error) {
      const hint = isAuthError(error) ? ' (check FRED_API_KEY)' : ''
      logger.error(`${definition.title} failed: ${getErrorMessage(error)}${hint}`)
      outcomes.push({ id: definition.id, status: 'failed', error: getErrorMessage(error) })
    }
  }

  const written: WrittenArtifact[] = []
  const failed: IndicatorId[] = []
  for (const outcome of outcomes) {
    if (outcome.status === 'written') written.push(outcome.artifact)
    else failed.push(outcome.id)
  }

  return { startedAt: started.toISOString(), durationMs: Date.now() - startTime, outcomes, written, failed }
}
