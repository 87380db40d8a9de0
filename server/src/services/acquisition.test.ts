import fs from 'fs'
import path from 'path'
import { describe, it, expect } from 'vitest'
import { acquire, rawStem } from './acquisition'
import { JobState } from '../models/Job'
import { InMemoryJobStore } from '../models/jobStore'
import { defaultRegistry } from '../models/Profile'
import { AcquisitionError } from '../utils/errors'
import { FakeAcquirer, makeTempDir } from '../test-support/fakes'

async function queuedJob() {
  return JobState.create(new InMemoryJobStore(), {
    jobId: 'job-a',
    locator: 'https://example.test/v',
    profiles: defaultRegistry.resolveSelection(['MP3 128kbps']),
    outputDirectory: makeTempDir(),
  })
}

describe('acquire', () => {
  it('sanitizes the title and returns the single raw file', async () => {
    const state = await queuedJob()
    const workDir = path.join(makeTempDir(), '.work')
    const acquirer = new FakeAcquirer({ title: 'AC/DC: Live!' })

    const source = await acquire(acquirer, state, 'https://example.test/v', workDir)

    expect(source).toEqual({ title: 'AC_DC Live', rawAudioPath: path.join(workDir, 'AC_DC Live_temp.wav') })
    expect(fs.existsSync(source.rawAudioPath)).toBe(true)
    expect(acquirer.fetched).toEqual([{ workDir, fileStem: 'AC_DC Live_temp' }])
    expect(state.snapshot()).toMatchObject({ status: 'acquiring', completedSteps: 1, title: 'AC_DC Live' })
  })

  it('does not advance when resolution fails', async () => {
    const state = await queuedJob()
    const attempt = acquire(new FakeAcquirer({ resolveError: 'Unsupported URL' }), state, 'nope', makeTempDir())
    await expect(attempt).rejects.toBeInstanceOf(AcquisitionError)
    await expect(attempt).rejects.toThrow('Could not resolve nope: Unsupported URL')
    expect(state.snapshot().completedSteps).toBe(0)
    expect(state.snapshot().status).toBe('resolving')
  })

  it('fails when nothing matching the stem was written', async () => {
    const state = await queuedJob()
    const workDir = makeTempDir()
    fs.writeFileSync(path.join(workDir, 'unrelated.wav'), '')
    await expect(
      acquire(new FakeAcquirer({ writeNothing: true }), state, 'https://example.test/v', workDir)
    ).rejects.toThrow('Failed to download audio file')
    expect(state.snapshot().completedSteps).toBe(0)
  })

  it('builds the raw stem from the title', () => {
    expect(rawStem('Song')).toBe('Song_temp')
  })
})
