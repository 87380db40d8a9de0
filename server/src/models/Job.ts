import type { Profile, QualityTier } from './Profile'
import type { ErrorCode } from '../utils/errors'
import { JobStateError } from '../utils/errors'

export type JobStatus =
  | 'queued'
  | 'resolving'
  | 'acquiring'
  | 'transcoding'
  | 'reporting'
  | 'packaging'
  | 'completed'
  | 'failed'

export interface LogEntry {
  at: string // ISO timestamp
  message: string
}

export interface OutputEntry {
  profile: string
  qualityTier: QualityTier
  fileName: string
  sizeBytes: number
}

export interface TerminalError {
  code: ErrorCode
  message: string
}

/** Immutable view of one job as published to the store and returned to pollers. */
export interface JobSnapshot {
  readonly jobId: string
  readonly locator: string
  readonly profiles: readonly string[]
  readonly outputDirectory: string
  readonly status: JobStatus
  readonly totalSteps: number
  readonly completedSteps: number
  readonly progress: number // integer percent
  readonly phase: string
  readonly log: readonly LogEntry[]
  readonly completed: boolean
  readonly title?: string
  readonly outputs: readonly OutputEntry[]
  readonly terminalError?: TerminalError
  readonly archivePath?: string
  readonly createdAt: string
  readonly updatedAt: string
}

/** Where published snapshots live. Implementations must store and return whole snapshots. */
export interface JobStore {
  save(snapshot: JobSnapshot): Promise<void>
  get(jobId: string): Promise<JobSnapshot | undefined>
}

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  queued: ['resolving', 'failed'],
  resolving: ['acquiring', 'failed'],
  acquiring: ['transcoding', 'failed'],
  transcoding: ['reporting', 'failed'],
  reporting: ['packaging', 'failed'],
  packaging: ['completed', 'failed'],
  completed: [],
  failed: [],
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

function freezeSnapshot(s: JobSnapshot): JobSnapshot {
  return Object.freeze({
    ...s,
    profiles: Object.freeze([...s.profiles]),
    log: Object.freeze(s.log.map((e) => Object.freeze({ ...e }))),
    outputs: Object.freeze(s.outputs.map((o) => Object.freeze({ ...o }))),
    terminalError: s.terminalError ? Object.freeze({ ...s.terminalError }) : undefined,
  })
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

interface JobRecord extends Omit<Mutable<JobSnapshot>, 'log' | 'outputs' | 'profiles' | 'progress'> {
  profiles: string[]
  log: LogEntry[]
  outputs: OutputEntry[]
}

export interface NewJob {
  jobId: string
  locator: string
  profiles: readonly Profile[]
  outputDirectory: string
}

/**
 * Mutable state of one job, owned by the orchestrator while it runs.
 * Every mutation publishes a frozen snapshot; publishes are chained so the store sees them in order.
 */
export class JobState {
  private readonly record: JobRecord
  private current: JobSnapshot
  private publishing: Promise<void> = Promise.resolve()

  private constructor(
    private readonly store: JobStore,
    record: JobRecord,
    private readonly now: () => Date
  ) {
    this.record = record
    this.current = this.build()
  }

  static async create(store: JobStore, job: NewJob, now: () => Date = () => new Date()): Promise<JobState> {
    if (job.profiles.length === 0) throw new JobStateError('A job needs at least one profile')
    const at = now().toISOString()
    const state = new JobState(
      store,
      {
        jobId: job.jobId,
        locator: job.locator,
        profiles: job.profiles.map((p) => p.name),
        outputDirectory: job.outputDirectory,
        status: 'queued',
        totalSteps: 1 + job.profiles.length,
        completedSteps: 0,
        phase: 'Queued',
        log: [],
        completed: false,
        outputs: [],
        createdAt: at,
        updatedAt: at,
      },
      now
    )
    await state.publish()
    return state
  }

  /** Take ownership of a queued job that was created by the submitting process. */
  static fromSnapshot(store: JobStore, snapshot: JobSnapshot, now: () => Date = () => new Date()): JobState {
    if (snapshot.status !== 'queued') {
      throw new JobStateError(`Job ${snapshot.jobId} is ${snapshot.status}, expected queued`)
    }
    return new JobState(
      store,
      {
        ...snapshot,
        profiles: [...snapshot.profiles],
        log: snapshot.log.map((e) => ({ ...e })),
        outputs: snapshot.outputs.map((o) => ({ ...o })),
      },
      now
    )
  }

  get jobId(): string {
    return this.record.jobId
  }

  get status(): JobStatus {
    return this.record.status
  }

  snapshot(): JobSnapshot {
    return this.current
  }

  transition(next: JobStatus): Promise<void> {
    this.assertMutable()
    if (next === 'completed' || next === 'failed') {
      throw new JobStateError(`Use succeed() or fail() to reach ${next}`)
    }
    if (!canTransition(this.record.status, next)) {
      throw new JobStateError(`Illegal transition ${this.record.status} -> ${next}`)
    }
    this.record.status = next
    return this.publish()
  }

  /** Overwrite the phase text without moving progress or writing to the log. */
  setPhase(phase: string): Promise<void> {
    this.assertMutable()
    this.record.phase = phase
    return this.publish()
  }

  advance(deltaSteps: number, phase: string): Promise<void> {
    this.assertMutable()
    if (!Number.isInteger(deltaSteps) || deltaSteps <= 0) {
      throw new JobStateError(`Progress delta must be a positive integer, got ${deltaSteps}`)
    }
    const next = this.record.completedSteps + deltaSteps
    if (next > this.record.totalSteps) {
      throw new JobStateError(`Progress ${next} would exceed ${this.record.totalSteps} steps`)
    }
    this.record.completedSteps = next
    this.record.phase = phase
    this.pushLog(phase)
    return this.publish()
  }

  appendLog(message: string): Promise<void> {
    this.assertMutable()
    this.pushLog(message)
    return this.publish()
  }

  setTitle(title: string): Promise<void> {
    this.assertMutable()
    this.record.title = title
    return this.publish()
  }

  recordOutput(output: OutputEntry): Promise<void> {
    this.assertMutable()
    this.record.outputs.push({ ...output })
    return this.publish()
  }

  fail(error: TerminalError): Promise<void> {
    this.assertMutable()
    this.record.status = 'failed'
    this.record.terminalError = { code: error.code, message: error.message }
    this.record.phase = `Error: ${error.message}`
    this.record.completed = true
    return this.publish()
  }

  succeed(archivePath: string): Promise<void> {
    this.assertMutable()
    if (this.record.status !== 'packaging') {
      throw new JobStateError(`Cannot complete a job that is ${this.record.status}`)
    }
    this.record.status = 'completed'
    this.record.archivePath = archivePath
    this.record.phase = 'Conversion completed!'
    this.record.completed = true
    return this.publish()
  }

  /** Resolves once every snapshot published so far has reached the store. */
  flushed(): Promise<void> {
    return this.publishing
  }

  private pushLog(message: string): void {
    this.record.log.push({ at: this.now().toISOString(), message })
  }

  private assertMutable(): void {
    if (this.record.completed) {
      throw new JobStateError(`Job ${this.record.jobId} is ${this.record.status} and can no longer change`)
    }
  }

  private build(): JobSnapshot {
    const r = this.record
    return freezeSnapshot({
      ...r,
      progress: Math.floor((r.completedSteps / r.totalSteps) * 100),
    })
  }

  private publish(): Promise<void> {
    this.record.updatedAt = this.now().toISOString()
    const snapshot = this.build()
    this.current = snapshot
    // A failed save is reported to its own caller only; later snapshots still go out
    const saved = this.publishing.catch(() => undefined).then(() => this.store.save(snapshot))
    this.publishing = saved
    return saved
  }
}
