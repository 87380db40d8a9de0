import fs from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import type { JobSnapshot, JobStore } from '../models/Job'
import { JobState } from '../models/Job'
import type { Profile, ProfileRegistry, SelectionPreset } from '../models/Profile'
import type { JobQueue } from '../workers/jobQueue'
import { ConfigurationError, errorMessage } from '../utils/errors'
import { assertPathWithinDir } from '../utils/assertPathWithinDir'

export interface SubmitRequest {
  locator: string
  profiles?: readonly string[]
  preset?: SelectionPreset
  /** Absolute, or relative to the output root. Must stay inside the output root. */
  outputDirectory?: string
  requestId?: string
}

export interface JobServiceDeps {
  store: JobStore
  queue: JobQueue
  registry: ProfileRegistry
  outputRoot: string
  newId?: () => string
  now?: () => Date
}

/**
 * Front door for the HTTP layer: validates and accepts jobs, answers status and archive lookups.
 * Validation happens here, so a rejected request never creates job state or reaches the worker.
 */
export class JobService {
  private readonly newId: () => string

  constructor(private readonly deps: JobServiceDeps) {
    this.newId = deps.newId ?? uuidv4
  }

  async submit(req: SubmitRequest): Promise<JobSnapshot> {
    const locator = req.locator.trim()
    if (!locator) throw new ConfigurationError('Please enter a video URL')
    const profiles = this.selectProfiles(req)

    const jobId = this.newId()
    const outputDirectory = this.resolveOutputDirectory(req.outputDirectory, jobId)

    const state = await JobState.create(
      this.deps.store,
      { jobId, locator, profiles, outputDirectory },
      this.deps.now
    )
    try {
      await this.deps.queue.enqueue({ jobId, requestId: req.requestId })
    } catch (err) {
      // Nothing will ever pick this job up; do not leave it looking queued
      await state.fail({ code: 'INTERNAL_ERROR', message: `Could not queue job: ${errorMessage(err)}` })
      throw err
    }
    return state.snapshot()
  }

  status(jobId: string): Promise<JobSnapshot | undefined> {
    return this.deps.store.get(jobId)
  }

  /** Archive path of a completed job, or undefined before completion, after failure, or once the file is gone. */
  async archive(jobId: string): Promise<string | undefined> {
    const snapshot = await this.deps.store.get(jobId)
    if (!snapshot || snapshot.status !== 'completed' || !snapshot.archivePath) return undefined
    return fs.existsSync(snapshot.archivePath) ? snapshot.archivePath : undefined
  }

  private selectProfiles(req: SubmitRequest): Profile[] {
    if (req.preset && req.profiles && req.profiles.length > 0) {
      throw new ConfigurationError('Send either profiles or preset, not both')
    }
    if (req.preset) return this.deps.registry.preset(req.preset)
    return this.deps.registry.resolveSelection(req.profiles ?? [])
  }

  private resolveOutputDirectory(requested: string | undefined, jobId: string): string {
    if (!requested || !requested.trim()) return path.join(path.resolve(this.deps.outputRoot), jobId)
    try {
      return assertPathWithinDir(this.deps.outputRoot, requested.trim())
    } catch {
      throw new ConfigurationError('Output directory must be inside the configured output root')
    }
  }
}
