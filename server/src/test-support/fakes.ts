import fs from 'fs'
import os from 'os'
import path from 'path'
import type { Profile } from '../models/Profile'
import type { JobSnapshot, JobStore } from '../models/Job'
import type { Acquirer, Encoder, FetchTarget, Outcome, SourceMetadata } from '../services/capabilities'
import { failed, succeeded } from '../services/capabilities'

export function makeTempDir(prefix = 'audio-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export interface FakeAcquirerOptions {
  title?: string
  resolveError?: string
  fetchError?: string
  /** Report success but leave workDir empty. */
  writeNothing?: boolean
}

export class FakeAcquirer implements Acquirer {
  readonly fetched: FetchTarget[] = []
  rawPath: string | undefined

  constructor(private readonly options: FakeAcquirerOptions = {}) {}

  async resolve(_locator: string): Promise<Outcome<SourceMetadata>> {
    if (this.options.resolveError) return failed(this.options.resolveError)
    return succeeded({ title: this.options.title ?? 'Test Song' })
  }

  async fetch(_locator: string, target: FetchTarget): Promise<Outcome> {
    this.fetched.push(target)
    if (this.options.fetchError) return failed(this.options.fetchError)
    if (!this.options.writeNothing) {
      this.rawPath = path.join(target.workDir, `${target.fileStem}.wav`)
      fs.writeFileSync(this.rawPath, Buffer.alloc(64))
    }
    return succeeded(undefined)
  }
}

export interface EncodeCall {
  sourcePath: string
  destPath: string
  profile: string
  sourceExisted: boolean
}

export interface FakeEncoderOptions {
  /** Bytes written per profile name; default 1024. */
  sizes?: Record<string, number>
  /** stderr returned per failing profile name. */
  failures?: Record<string, string>
  /** Profiles whose encode resolves ok but writes no file. */
  silent?: string[]
}

export class FakeEncoder implements Encoder {
  readonly calls: EncodeCall[] = []

  constructor(private readonly options: FakeEncoderOptions = {}) {}

  async encode(sourcePath: string, destPath: string, profile: Profile): Promise<Outcome> {
    this.calls.push({ sourcePath, destPath, profile: profile.name, sourceExisted: fs.existsSync(sourcePath) })
    const stderr = this.options.failures?.[profile.name]
    if (stderr !== undefined) return failed(stderr)
    if (!this.options.silent?.includes(profile.name)) {
      fs.writeFileSync(destPath, Buffer.alloc(this.options.sizes?.[profile.name] ?? 1024))
    }
    return succeeded(undefined)
  }
}

/** Store that keeps every published snapshot, in order. `failingSave` (1-based) rejects that one save. */
export class RecordingJobStore implements JobStore {
  readonly history: JobSnapshot[] = []
  attempts = 0
  private readonly latest = new Map<string, JobSnapshot>()

  constructor(private readonly failingSave?: number) {}

  async save(snapshot: JobSnapshot): Promise<void> {
    this.attempts++
    if (this.attempts === this.failingSave) throw new Error('ECONNRESET')
    this.history.push(snapshot)
    this.latest.set(snapshot.jobId, snapshot)
  }

  async get(jobId: string): Promise<JobSnapshot | undefined> {
    return this.latest.get(jobId)
  }
}

/** Number of entries in a zip, read from the end-of-central-directory record (archives without a comment). */
export function zipEntryCount(zipPath: string): number {
  const buf = fs.readFileSync(zipPath)
  const eocd = buf.length - 22
  if (buf.readUInt32LE(eocd) !== 0x06054b50) throw new Error('No end-of-central-directory record')
  return buf.readUInt16LE(eocd + 10)
}
