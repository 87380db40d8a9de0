import type { JobSnapshot, JobStore } from './Job'
import { isTerminal } from './Job'

/**
 * Process-local store (default backend). Snapshots are frozen, so handing out the stored object is safe.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, JobSnapshot>()

  async save(snapshot: JobSnapshot): Promise<void> {
    this.jobs.set(snapshot.jobId, snapshot)
  }

  async get(jobId: string): Promise<JobSnapshot | undefined> {
    return this.jobs.get(jobId)
  }

  /** Drop terminal jobs last updated before the cutoff. Returns how many were removed. */
  prune(olderThan: Date): number {
    let removed = 0
    for (const [id, snapshot] of this.jobs) {
      if (isTerminal(snapshot.status) && Date.parse(snapshot.updatedAt) < olderThan.getTime()) {
        this.jobs.delete(id)
        removed++
      }
    }
    return removed
  }

  get size(): number {
    return this.jobs.size
  }
}

/** The slice of ioredis the Redis store needs. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>
}

const KEY_PREFIX = 'audio:job:'

/**
 * Shared store for when the worker runs in its own process (JOB_BACKEND=redis).
 * Key: audio:job:${jobId}. One SET per snapshot, so readers always get a whole snapshot.
 */
export class RedisJobStore implements JobStore {
  constructor(
    private readonly redis: KeyValueClient,
    private readonly ttlSec: number
  ) {}

  async save(snapshot: JobSnapshot): Promise<void> {
    await this.redis.set(key(snapshot.jobId), JSON.stringify(snapshot), 'EX', this.ttlSec)
  }

  async get(jobId: string): Promise<JobSnapshot | undefined> {
    const val = await this.redis.get(key(jobId))
    if (!val) return undefined
    const parsed: JobSnapshot = JSON.parse(val)
    return Object.freeze(parsed)
  }
}

function key(jobId: string): string {
  return `${KEY_PREFIX}${jobId}`
}
