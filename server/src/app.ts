import express, { Request, Response, NextFunction } from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import type { Runtime } from './runtime'
import { createJobRoutes } from './routes/jobs'
import { createProfileRoutes } from './routes/profiles'
import { createHealthRoutes } from './routes/health'
import { requestIdMiddleware, requestLogger } from './middleware/requestId'
import { sentryRequestIdScope, setupSentryErrorHandler } from './lib/sentry'
import { AppError } from './utils/errors'

export interface AppOptions {
  corsOrigins: string[]
  env: string
  release: string
  /** Requests per minute per client on /api. */
  rateLimitPerMinute?: number
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '')
}

/** In dev, allow any origin that is localhost, 127.0.0.1, or [::1] (any port). */
function isLocalOrigin(origin: string): boolean {
  try {
    const host = new URL(origin).hostname.toLowerCase()
    return host === 'localhost' || host === '127.0.0.1' || host === '[::1]' || host === '::1'
  } catch {
    return false
  }
}

export function createApp(runtime: Runtime, options: AppOptions): express.Express {
  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')
  app.set('trust proxy', 1)

  const allowedOrigins = new Set(options.corsOrigins.map(normalizeOrigin))
  const isAllowedOrigin = (origin: string | undefined): boolean => {
    if (!origin) return true // curl, server-to-server
    const norm = normalizeOrigin(origin)
    if (allowedOrigins.has(norm)) return true
    return options.env !== 'production' && isLocalOrigin(norm)
  }

  app.use(
    cors({
      origin: (origin, callback) => callback(null, isAllowedOrigin(origin)),
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-Id'],
      exposedHeaders: ['X-Request-Id', 'Location', 'Content-Disposition'],
      optionsSuccessStatus: 204,
    })
  )

  // Request ID: correlate client → API → worker
  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(express.json({ limit: '100kb' }))
  app.use(
    '/api',
    rateLimit({
      windowMs: 60 * 1000,
      limit: options.rateLimitPerMinute ?? 120,
      message: { message: 'Too many requests. Please wait.' },
      standardHeaders: true,
      legacyHeaders: false,
    })
  )

  app.use('/api/jobs', createJobRoutes(runtime.jobService))
  app.use('/api/profiles', createProfileRoutes(runtime.registry))
  app.use(createHealthRoutes(runtime, { release: options.release, env: options.env }))

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: 'Not found' })
  })

  // Sentry error handler (after all routes); passes the error on to ours
  setupSentryErrorHandler(app)

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      if (err.httpStatus >= 500) requestLogger(req).error({ msg: 'Request failed', code: err.code, err })
      res.status(err.httpStatus).json({ code: err.code, message: err.message })
      return
    }
    // body-parser marks malformed JSON with status 400
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ code: 'CONFIGURATION_ERROR', message: 'Request body must be valid JSON' })
      return
    }
    requestLogger(req).error({ msg: 'Unhandled error', err })
    res.status(500).json({ code: 'INTERNAL_ERROR', message: 'Internal server error' })
  })

  return app
}
