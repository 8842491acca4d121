import { parseArgs } from 'node:util'
import { FREDAPIClient } from '@/lib/api-clients/fred'
import { loadFetcherEnv } from '@/lib/config'
import { IndicatorIdSchema, type IndicatorId } from '@/lib/schema/indicator'
import { ConfigError, getErrorMessage } from '@/lib/utils/errors'
import { createLogger, type Logger } from '@/lib/utils/logger'
import { collectIndicators } from './collect'
import { DirectoryPublisher, NoopPublisher, runScheduledJob, type ArtifactPublisher } from './orchestrator'

export interface CliOptions {
  only?: IndicatorId[]
  publishDir?: string
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      only: { type: 'string' },
      'publish-dir': { type: 'string' },
    },
    strict: true,
  })

  const options: CliOptions = {}
  if (values.only) {
    options.only = values.only
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean)
      .map((id) => {
        const parsed = IndicatorIdSchema.safeParse(id)
        if (!parsed.success) throw new ConfigError(`Unknown indicator "${id}" (expected one of ${IndicatorIdSchema.options.join(', ')})`)
        return parsed.data
      })
  }
  if (values['publish-dir']) options.publishDir = values['publish-dir']
  return options
}

export interface RunDependencies {
  env?: Record<string, string | undefined>
  fetchImpl?: typeof fetch
  now?: () => Date
  logger?: Logger
}

/**
 * Exit code is 0 when at least one indicator was written and every written
 * file was published, 1 when the arguments or environment are invalid, every
 * indicator failed or a file could not be published.
 */
export async function runCli(argv: string[], deps: RunDependencies = {}): Promise<number> {
  const logger = deps.logger ?? createLogger('fetch-data')

  try {
    const options = parseCliArgs(argv)
    const env = loadFetcherEnv(deps.env ?? process.env)

    logger.info(`Starting macro data collection (${(deps.now?.() ?? new Date()).toISOString().slice(0, 10)})`)
    logger.info(`FRED API key: ${env.FRED_API_KEY ? 'set' : 'missing'}`)

    const client = new FREDAPIClient({ apiKey: env.FRED_API_KEY, baseUrl: env.FRED_BASE_URL, fetchImpl: deps.fetchImpl })
    const publishDir = options.publishDir ?? env.PUBLISH_DIR
    const publisher: ArtifactPublisher = publishDir ? new DirectoryPublisher(publishDir, logger) : new NoopPublisher()

    const { report, publish } = await runScheduledJob({
      collect: () => collectIndicators({ client, dataDir: env.DATA_DIR, only: options.only, now: deps.now, logger }),
      publisher,
      logger,
    })

    logger.info(`Done in ${report.durationMs}ms: ${report.written.length} written, ${report.failed.length} failed`)
    if (publish && publish.failed.length > 0) {
      logger.error(`Publishing incomplete: ${publish.failed.map((f) => f.file).join(', ')} not copied to ${publishDir}`)
      return 1
    }
    return report.written.length > 0 ? 0 : 1
  } catch (error) {
    logger.error(`Data collection aborted: ${getErrorMessage(error)}`)
    return 1
  }
}
