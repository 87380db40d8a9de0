import './env'
import { getConfig, sentryOptions } from './config'
import { initSentry } from './lib/sentry'
import { getLogger } from './lib/logger'
import { createRuntime } from './productionRuntime'
import { createApp } from './app'

const log = getLogger('api')
const config = getConfig()
initSentry(sentryOptions(config))
const runtime = createRuntime(config)
const app = createApp(runtime, {
  corsOrigins: config.CORS_ORIGINS,
  env: config.NODE_ENV,
  release: config.RELEASE,
})

const server = app.listen(config.PORT, () => {
  log.info({ msg: 'Server listening', port: config.PORT, backend: config.JOB_BACKEND, outputRoot: config.OUTPUT_ROOT })

  // Worker runs in a separate container when Dockerized (DISABLE_WORKER=true, JOB_BACKEND=redis).
  if (!config.DISABLE_WORKER) {
    runtime.startWorker()
    log.info({ msg: 'Background worker started' })
  } else if (config.JOB_BACKEND === 'memory') {
    log.warn({ msg: 'DISABLE_WORKER with the memory backend: accepted jobs will never run' })
  }

  runtime.startCleanup()
  log.info({ msg: 'Output cleanup timer started', maxAgeMs: config.FILE_MAX_AGE_MS })

  runtime
    .checkTools()
    .then((tools) => {
      const missing = tools.filter((t) => !t.available)
      if (missing.length > 0) {
        log.warn({ msg: 'Missing dependencies', missing: missing.map((t) => t.name) })
      } else {
        log.info({ msg: 'All dependencies found', tools: tools.map((t) => `${t.name} ${t.version ?? ''}`.trim()) })
      }
    })
    .catch((err: unknown) => log.error({ msg: 'Dependency check failed', err }))
})

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    log.fatal({ msg: `Port ${config.PORT} is already in use` })
  } else {
    log.fatal({ msg: 'Server error', err: error })
  }
  process.exit(1)
})

function shutdown() {
  server.close(() => {
    runtime
      .close()
      .then(() => {
        log.info({ msg: 'Server closed' })
        process.exit(0)
      })
      .catch((err: unknown) => {
        log.error({ msg: 'Shutdown failed', err })
        process.exit(1)
      })
  })
}

process.on('SIGTERM', () => {
  log.info({ msg: 'SIGTERM received, shutting down gracefully' })
  shutdown()
})

process.on('SIGINT', () => {
  log.info({ msg: 'SIGINT received, shutting down gracefully' })
  shutdown()
})
