/**
 * Error reporting through @sentry/node v8. Nothing is sent unless SENTRY_DSN is configured.
 * v8 instruments Express on init; the error handler goes after the routes.
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import type { RequestWithId } from '../middleware/requestId'
import { getLogger } from './logger'

export interface SentryOptions {
  dsn?: string
  environment: string
  release: string
  tracesSampleRate: number
}

let enabled = false

export function initSentry(options: SentryOptions): void {
  if (!options.dsn) return
  try {
    Sentry.init({
      dsn: options.dsn,
      environment: options.environment,
      release: options.release,
      tracesSampleRate: options.tracesSampleRate,
      integrations: [Sentry.expressIntegration()],
    })
    enabled = true
  } catch (err) {
    getLogger('api').warn({ msg: 'Sentry init failed', err })
  }
}

export function setupSentryErrorHandler(app: Express): void {
  if (enabled) Sentry.setupExpressErrorHandler(app)
}

/** Tags the current scope with the request id; mount after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  const withId: RequestWithId = req
  if (enabled && withId.requestId) Sentry.getCurrentScope().setTag('request_id', withId.requestId)
  next()
}

/** A job ended in `failed`: report it with the job, request and error code as tags. */
export function captureJobError(jobId: string, requestId: string | undefined, code: string, err: unknown): void {
  if (!enabled) return
  Sentry.withScope((scope) => {
    scope.setTags({ service: 'worker', job_id: jobId, error_code: code })
    if (requestId) scope.setTag('request_id', requestId)
    Sentry.captureException(err)
  })
}
