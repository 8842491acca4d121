import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { IndicatorDocumentSchema, type IndicatorDocument, type IndicatorId } from '@/lib/schema/indicator'
import { getErrorMessage, StorageError, ValidationError } from '@/lib/utils/errors'

export interface WrittenArtifact {
  id: IndicatorId
  file: string
  path: string
  bytes: number
}

/**
 * Validates and serialises a document. Key order follows the schema, so the
 * same document always produces the same bytes.
 */
export function serializeDocument(doc: IndicatorDocument): string {
  const parsed = IndicatorDocumentSchema.safeParse(doc)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ValidationError(`${doc.id}: ${issue?.message ?? 'invalid document'}`, issue?.path.join('.'))
  }
  return `${JSON.stringify(parsed.data, null, 2)}\n`
}

/**
 * Fills a temp file beside `target` and renames it over the target, so readers
 * see either the previous file or the new one. On failure the previous file is
 * left as it was and the temp file is removed.
 */
export async function replaceFile(target: string, fill: (tempPath: string) => Promise<void>): Promise<void> {
  const temp = `${target}.${process.pid}.tmp`

  try {
    await mkdir(path.dirname(target), { recursive: true })
    await fill(temp)
    await rename(temp, target)
  } catch (error) {
    // the temp path may not even be reachable (e.g. the directory is a file)
    await rm(temp, { force: true }).catch(() => undefined)
    throw new StorageError(`Failed to write ${target}: ${getErrorMessage(error)}`, target)
  }
}

export async function writeIndicatorDocument(dir: string, file: string, doc: IndicatorDocument): Promise<WrittenArtifact> {
  const body = serializeDocument(doc)
  const target = path.join(dir, file)
  await replaceFile(target, (temp) => writeFile(temp, body, 'utf-8'))
  return { id: doc.id, file, path: target, bytes: Buffer.byteLength(body, 'utf-8') }
}
