/**
 * pino JSON logs shared by the API and the worker.
 * Every line carries service, env and release; request and job context come from child loggers.
 * LOG_LEVEL=silent keeps the test run quiet.
 */
import pino from 'pino'

export type ServiceName = 'api' | 'worker'

const base = {
  env: process.env.NODE_ENV || 'development',
  release: process.env.RELEASE || 'dev',
}

/** Connection strings and credentials that may end up inside logged objects. */
const REDACT_PATHS = [
  'REDIS_URL',
  'SENTRY_DSN',
  '*.REDIS_URL',
  '*.SENTRY_DSN',
  'req.headers.authorization',
  'req.headers.cookie',
]

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  const existing = loggers.get(service)
  if (existing) return existing
  const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    base: { service, ...base },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    serializers: { err: pino.stdSerializers.err },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
  loggers.set(service, logger)
  return logger
}

export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId })
}

/** Worker logger bound to one job; requestId links it back to the submitting request. */
export function withJobContext(jobId: string, requestId?: string): pino.Logger {
  return getLogger('worker').child({ jobId, requestId })
}

/** Last path segment only; output roots tend to contain home directories. */
export function redactFilePath(filePath: string): string {
  const name = filePath.split(/[\\/]/).filter(Boolean).pop()
  return name ?? '[REDACTED]'
}
