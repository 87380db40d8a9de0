import fs from 'fs'
import path from 'path'
import { describe, it, expect } from 'vitest'
import { cleanupOutputs, startFileCleanup } from './fileCleanup'
import { InMemoryJobStore } from '../models/jobStore'
import { makeTempDir } from '../test-support/fakes'

const HOUR = 60 * 60 * 1000

function makeJobDir(root: string, name: string, ageMs: number): string {
  const dir = path.join(root, name)
  fs.mkdirSync(dir)
  fs.writeFileSync(path.join(dir, 'Song.mp3'), 'x')
  const when = new Date(Date.now() - ageMs)
  fs.utimesSync(dir, when, when)
  return dir
}

describe('cleanupOutputs', () => {
  it('deletes only entries older than the cutoff', () => {
    const root = makeTempDir()
    makeJobDir(root, 'old-job', 2 * HOUR)
    makeJobDir(root, 'new-job', 0)
    expect(cleanupOutputs(root, HOUR)).toEqual(['old-job'])
    expect(fs.readdirSync(root)).toEqual(['new-job'])
  })

  it('leaves symlinks alone', () => {
    const root = makeTempDir()
    const target = makeTempDir()
    const link = path.join(root, 'linked')
    fs.symlinkSync(target, link)
    const when = new Date(Date.now() - 2 * HOUR)
    fs.lutimesSync(link, when, when)
    expect(cleanupOutputs(root, HOUR)).toEqual([])
    expect(fs.existsSync(target)).toBe(true)
  })

  it('returns nothing for a missing root', () => {
    expect(cleanupOutputs(path.join(makeTempDir(), 'absent'), HOUR)).toEqual([])
  })
})

describe('startFileCleanup', () => {
  it('runs immediately and prunes finished in-memory jobs', async () => {
    const root = makeTempDir()
    makeJobDir(root, 'stale', 3 * HOUR)
    const store = new InMemoryJobStore()
    await store.save({
      jobId: 'stale',
      locator: 'l',
      profiles: ['MP3 128kbps'],
      outputDirectory: path.join(root, 'stale'),
      status: 'completed',
      totalSteps: 2,
      completedSteps: 2,
      progress: 100,
      phase: 'Conversion completed!',
      log: [],
      completed: true,
      outputs: [],
      createdAt: '2020-01-01T00:00:00.000Z',
      updatedAt: '2020-01-01T00:00:00.000Z',
    })
    const stop = startFileCleanup({ outputRoot: root, maxAgeMs: HOUR, intervalMs: HOUR, store })
    stop()
    expect(fs.existsSync(path.join(root, 'stale'))).toBe(false)
    expect(store.size).toBe(0)
  })
})
