import { copyFile } from 'node:fs/promises'
import path from 'node:path'
import { replaceFile, type WrittenArtifact } from '@/lib/storage/json-writer'
import { getErrorMessage } from '@/lib/utils/errors'
import { createLogger, type Logger } from '@/lib/utils/logger'
import type { CollectionReport } from './collect'

export interface PublishFailure {
  file: string
  error: string
}

export interface PublishReport {
  published: string[]
  failed: PublishFailure[]
}

/**
 * Whatever makes written files visible to viewers. Hosting itself lives
 * outside this repository; implementations only hand the files over.
 */
export interface ArtifactPublisher {
  readonly name: string
  publish(artifacts: readonly WrittenArtifact[]): Promise<PublishReport>
}

/** Files under public/data are already where the static export picks them up. */
export class NoopPublisher implements ArtifactPublisher {
  readonly name = 'noop'

  async publish(artifacts: readonly WrittenArtifact[]): Promise<PublishReport> {
    return { published: artifacts.map((a) => a.file), failed: [] }
  }
}

/**
 * Copies each file into `targetDir` through a temp file and a rename. A file
 * that cannot be copied is logged and reported; the rest still go out.
 */
export class DirectoryPublisher implements ArtifactPublisher {
  readonly name: string

  constructor(
    private readonly targetDir: string,
    private readonly logger: Logger = createLogger('publish')
  ) {
    this.name = `directory:${targetDir}`
  }

  async publish(artifacts: readonly WrittenArtifact[]): Promise<PublishReport> {
    const report: PublishReport = { published: [], failed: [] }
    for (const artifact of artifacts) {
      try {
        await replaceFile(path.join(this.targetDir, artifact.file), (temp) => copyFile(artifact.path, temp))
        report.published.push(artifact.file)
      } catch (error) {
        this.logger.error(`Could not publish ${artifact.file}: ${getErrorMessage(error)}`)
        report.failed.push({ file: artifact.file, error: getErrorMessage(error) })
      }
    }
    return report
  }
}

export interface ScheduledJob {
  collect: () => Promise<CollectionReport>
  publisher: ArtifactPublisher
  logger?: Logger
}

export interface ScheduledJobResult {
  report: CollectionReport
  /** Absent when nothing was written and publishing was skipped. */
  publish?: PublishReport
}

/** One scheduled run: fetch everything, then publish what was written. */
export async function runScheduledJob({ collect, publisher, logger = createLogger('job') }: ScheduledJob): Promise<ScheduledJobResult> {
  const report = await collect()
  if (report.written.length === 0) {
    logger.warn('Nothing was written; skipping publish')
    return { report }
  }

  const publish = await publisher.publish(report.written)
  if (publish.failed.length > 0) {
    logger.warn(`Published ${publish.published.length} of ${report.written.length} file(s) via ${publisher.name}`)
  } else {
    logger.info(`Published ${publish.published.length} file(s) via ${publisher.name}`)
  }
  return { report, publish }
}
