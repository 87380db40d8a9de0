import Queue from 'bull'
import type { JobSnapshot } from '../models/Job'
import { createRedisClient } from '../utils/redis'
import { getLogger } from '../lib/logger'

export interface JobPayload {
  jobId: string
  requestId?: string
}

export type JobHandler = (payload: JobPayload) => Promise<JobSnapshot>

/** Hands accepted jobs to a background worker. enqueue() returns as soon as the job is accepted. */
export interface JobQueue {
  enqueue(payload: JobPayload): Promise<void>
  start(handler: JobHandler): void
  /** Jobs accepted but not finished. */
  depth(): Promise<number>
  close(): Promise<void>
}

/**
 * Single in-process worker: jobs run one after another in submission order, off the request path.
 * Jobs enqueued before start() wait until a handler is attached.
 */
export class InProcessJobQueue implements JobQueue {
  private handler: JobHandler | undefined
  private backlog: JobPayload[] = []
  private tail: Promise<void> = Promise.resolve()
  private pending = 0
  private closed = false

  async enqueue(payload: JobPayload): Promise<void> {
    if (this.closed) throw new Error('Queue is closed')
    if (!this.handler) {
      this.backlog.push(payload)
      return
    }
    this.schedule(this.handler, payload)
  }

  start(handler: JobHandler): void {
    this.handler = handler
    const waiting = this.backlog
    this.backlog = []
    for (const payload of waiting) this.schedule(handler, payload)
  }

  async depth(): Promise<number> {
    return this.backlog.length + this.pending
  }

  /** Resolves when every job scheduled so far has finished. */
  idle(): Promise<void> {
    return this.tail
  }

  async close(): Promise<void> {
    this.closed = true
    await this.tail
  }

  private schedule(handler: JobHandler, payload: JobPayload): void {
    const log = getLogger('worker')
    this.pending++
    this.tail = this.tail
      .then(() => handler(payload))
      .then(
        (snapshot) => log.info({ msg: 'Job finished', jobId: payload.jobId, status: snapshot.status }),
        (err: unknown) => log.error({ msg: 'Job handler crashed', jobId: payload.jobId, err })
      )
      .finally(() => {
        this.pending--
      })
  }
}

export const QUEUE_NAME = 'audio-derivatives'

/**
 * Bull queue on Redis, for running the worker in its own process (JOB_BACKEND=redis).
 * One attempt per job: a retry would replay a job whose state is already terminal.
 */
export class BullJobQueue implements JobQueue {
  private readonly queue: import('bull').Queue<JobPayload>

  constructor(
    redisUrl: string,
    private readonly concurrency: number
  ) {
    this.queue = new Queue<JobPayload>(QUEUE_NAME, {
      createClient: () => createRedisClient(redisUrl),
    })
  }

  async enqueue(payload: JobPayload): Promise<void> {
    await this.queue.add(payload, { jobId: payload.jobId, attempts: 1, removeOnComplete: true })
  }

  start(handler: JobHandler): void {
    const log = getLogger('worker')
    this.queue
      .process(this.concurrency, async (job) => {
        const snapshot = await handler(job.data)
        // Rethrow so Bull marks the job failed; state and log already live in the job store
        if (snapshot.status === 'failed') {
          throw new Error(snapshot.terminalError?.message ?? 'Job failed')
        }
        return snapshot.status
      })
      .catch((err: unknown) => log.error({ msg: 'Bull worker stopped', err }))
    this.queue.on('failed', (job, err) => {
      log.warn({ msg: 'Bull job failed', jobId: job.data.jobId, err: err.message })
    })
  }

  /** Waiting + active + delayed. */
  async depth(): Promise<number> {
    const counts = await this.queue.getJobCounts()
    return (counts.waiting ?? 0) + (counts.active ?? 0) + (counts.delayed ?? 0)
  }

  async close(): Promise<void> {
    await this.queue.close()
  }
}
