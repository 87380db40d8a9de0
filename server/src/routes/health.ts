/**
 * Health, readiness and version endpoints (no /api prefix).
 */
import { Router, Request, Response } from 'express'
import type { Runtime } from '../runtime'

const READYZ_TIMEOUT_MS = 10_000

function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  return Promise.race([
    p,
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms)
    }),
  ]).finally(() => clearTimeout(timer))
}

export interface HealthInfo {
  release: string
  env: string
}

export function createHealthRoutes(runtime: Runtime, info: HealthInfo): Router {
  const router = Router()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /readyz: 200 only if yt-dlp and ffmpeg run and the queue answers; 503 with details if not. */
  router.get('/readyz', async (_req: Request, res: Response) => {
    const errors: Record<string, string> = {}
    let queueDepth: number | undefined
    try {
      const tools = await withTimeout(runtime.checkTools(), READYZ_TIMEOUT_MS, 'Tool check')
      for (const tool of tools) {
        if (!tool.available) errors[tool.name] = tool.error || 'not available'
      }
    } catch (err) {
      errors.tools = err instanceof Error ? err.message : 'tool check failed'
    }
    try {
      queueDepth = await withTimeout(runtime.queue.depth(), READYZ_TIMEOUT_MS, 'Queue')
    } catch (err) {
      errors.queue = err instanceof Error ? err.message : 'queue unreachable'
    }
    if (Object.keys(errors).length > 0) {
      res.status(503).json({ status: 'unhealthy', ...errors })
      return
    }
    res.status(200).json({ status: 'ok', queueDepth })
  })

  /** GET /version: service, release, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({ service: 'api', release: info.release, env: info.env })
  })

  return router
}
