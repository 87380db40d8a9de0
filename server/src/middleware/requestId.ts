/**
 * Request ID middleware: reuse x-request-id from the edge or generate a UUID.
 * Echoed in the response header and carried into the job payload, so API and worker logs correlate.
 */
import type { Request, Response, NextFunction } from 'express'
import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import { withRequestId } from '../lib/logger'

export const REQUEST_ID_HEADER = 'x-request-id'

export interface RequestWithId extends Request {
  requestId?: string
  log?: Logger
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim().slice(0, 128) : uuidv4()
  const withId: RequestWithId = req
  withId.requestId = id
  withId.log = withRequestId(id)
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}

export function requestLogger(req: Request): Logger {
  const withId: RequestWithId = req
  return withId.log ?? withRequestId(withId.requestId)
}
