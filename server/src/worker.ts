/**
 * Standalone worker process (separate container): node dist/worker.js
 * Shares jobs with the API through Redis, so it only runs with JOB_BACKEND=redis.
 */
import './env'
import { getConfig, sentryOptions } from './config'
import { createRuntime } from './productionRuntime'
import { getLogger } from './lib/logger'
import { initSentry } from './lib/sentry'

const log = getLogger('worker')
const config = getConfig()
initSentry(sentryOptions(config))
if (config.JOB_BACKEND !== 'redis') {
  log.error({ msg: 'A standalone worker needs JOB_BACKEND=redis to share jobs with the API' })
  process.exit(1)
}

const runtime = createRuntime(config)
runtime.startWorker()
log.info({ msg: 'Worker process started', concurrency: config.WORKER_CONCURRENCY })

function shutdown(signal: string) {
  log.info({ msg: `${signal} received, draining worker` })
  runtime
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log.error({ msg: 'Worker shutdown failed', err })
      process.exit(1)
    })
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
