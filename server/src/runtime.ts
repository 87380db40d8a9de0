import type { JobStore } from './models/Job'
import { InMemoryJobStore } from './models/jobStore'
import type { ProfileRegistry } from './models/Profile'
import type { Acquirer, Encoder, ToolCheck } from './services/capabilities'
import { Orchestrator } from './services/orchestrator'
import { JobService } from './services/jobService'
import type { JobQueue } from './workers/jobQueue'
import { createJobHandler } from './workers/audioProcessor'
import { startFileCleanup } from './utils/fileCleanup'

export interface Runtime {
  registry: ProfileRegistry
  store: JobStore
  queue: JobQueue
  jobService: JobService
  /** Executable checks for /readyz. */
  checkTools(): Promise<ToolCheck[]>
  startWorker(): void
  startCleanup(): void
  close(): Promise<void>
}

export interface RuntimeParts {
  registry: ProfileRegistry
  store: JobStore
  queue: JobQueue
  acquirer: Acquirer
  encoder: Encoder
  outputRoot: string
  checkTools?: () => Promise<ToolCheck[]>
  cleanup?: { maxAgeMs: number; intervalMs: number }
  onClose?: () => Promise<void>
}

/** Wire services from explicit parts; tests pass fakes here. */
export function assembleRuntime(parts: RuntimeParts): Runtime {
  const orchestrator = new Orchestrator({
    acquirer: parts.acquirer,
    encoder: parts.encoder,
    registry: parts.registry,
  })
  const jobService = new JobService({
    store: parts.store,
    queue: parts.queue,
    registry: parts.registry,
    outputRoot: parts.outputRoot,
  })
  let stopCleanup: (() => void) | undefined

  return {
    registry: parts.registry,
    store: parts.store,
    queue: parts.queue,
    jobService,
    checkTools: parts.checkTools ?? (async () => []),
    startWorker() {
      parts.queue.start(createJobHandler(parts.store, orchestrator))
    },
    startCleanup() {
      if (!parts.cleanup || stopCleanup) return
      stopCleanup = startFileCleanup({
        outputRoot: parts.outputRoot,
        maxAgeMs: parts.cleanup.maxAgeMs,
        intervalMs: parts.cleanup.intervalMs,
        store: parts.store instanceof InMemoryJobStore ? parts.store : undefined,
      })
    },
    async close() {
      stopCleanup?.()
      await parts.queue.close()
      await parts.onClose?.()
    },
  }
}
