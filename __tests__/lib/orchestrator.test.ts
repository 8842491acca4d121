import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import type { CollectionReport } from '@/lib/pipeline/collect'
import { DirectoryPublisher, runScheduledJob, type ArtifactPublisher, type PublishReport } from '@/lib/pipeline/orchestrator'
import type { WrittenArtifact } from '@/lib/storage/json-writer'
import { silentLogger } from '../helpers/fake-source'

function report(written: WrittenArtifact[]): CollectionReport {
  return { startedAt: '2024-06-01T06:00:00.000Z', durationMs: 5, outcomes: [], written, failed: [] }
}

function recordingPublisher() {
  const publish = vi.fn(
    async (artifacts: readonly WrittenArtifact[]): Promise<PublishReport> => ({ published: artifacts.map((a) => a.file), failed: [] })
  )
  const publisher: ArtifactPublisher = { name: 'recording', publish }
  return { publisher, publish }
}

describe('runScheduledJob', () => {
  it('publishes what the run wrote', async () => {
    const artifact: WrittenArtifact = { id: 'nfci', file: 'nfci.json', path: '/data/nfci.json', bytes: 10 }
    const { publisher, publish } = recordingPublisher()

    const result = await runScheduledJob({ collect: async () => report([artifact]), publisher, logger: silentLogger })

    expect(result.publish).toEqual({ published: ['nfci.json'], failed: [] })
    expect(publish).toHaveBeenCalledWith([artifact])
  })

  it('skips publishing when nothing was written', async () => {
    const { publisher, publish } = recordingPublisher()

    const result = await runScheduledJob({ collect: async () => report([]), publisher, logger: silentLogger })

    expect(result.publish).toBeUndefined()
    expect(publish).not.toHaveBeenCalled()
  })
})

describe('DirectoryPublisher', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'macro-publish-'))
    await writeFile(path.join(dir, 'm2.json'), '{"id":"m2"}\n')
    await writeFile(path.join(dir, 'nfci.json'), '{"id":"nfci"}\n')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  const artifacts = (): WrittenArtifact[] => [
    { id: 'm2', file: 'm2.json', path: path.join(dir, 'm2.json'), bytes: 12 },
    { id: 'nfci', file: 'nfci.json', path: path.join(dir, 'nfci.json'), bytes: 14 },
  ]

  it('copies written files into the target directory', async () => {
    const target = path.join(dir, 'site', 'data')

    const result = await new DirectoryPublisher(target, silentLogger).publish(artifacts())

    expect(result).toEqual({ published: ['m2.json', 'nfci.json'], failed: [] })
    expect((await readdir(target)).sort()).toEqual(['m2.json', 'nfci.json'])
    expect(await readFile(path.join(target, 'm2.json'), 'utf-8')).toBe('{"id":"m2"}\n')
  })

  it('keeps publishing the other files when one cannot be copied', async () => {
    const target = path.join(dir, 'site')
    await mkdir(path.join(target, 'm2.json'), { recursive: true })

    const result = await new DirectoryPublisher(target, silentLogger).publish(artifacts())

    expect(result.published).toEqual(['nfci.json'])
    expect(result.failed.map((f) => f.file)).toEqual(['m2.json'])
    expect((await readdir(target)).sort()).toEqual(['m2.json', 'nfci.json'])
    expect(await readFile(path.join(target, 'nfci.json'), 'utf-8')).toBe('{"id":"nfci"}\n')
  })
})
