import type { JobStore } from '../models/Job'
import { JobState } from '../models/Job'
import type { Orchestrator } from '../services/orchestrator'
import type { JobHandler } from './jobQueue'
import { withJobContext } from '../lib/logger'

/**
 * Worker side of the queue: pick up the queued snapshot the API stored, take ownership, run it.
 */
export function createJobHandler(store: JobStore, orchestrator: Orchestrator): JobHandler {
  return async ({ jobId, requestId }) => {
    const snapshot = await store.get(jobId)
    if (!snapshot) {
      withJobContext(jobId, requestId).error({ msg: 'Job state missing; dropping job' })
      throw new Error(`Job ${jobId} not found in store`)
    }
    const state = JobState.fromSnapshot(store, snapshot)
    return orchestrator.run(state, requestId)
  }
}
