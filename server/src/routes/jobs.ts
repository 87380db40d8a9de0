import express, { Request, Response, NextFunction } from 'express'
import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import type { JobService } from '../services/jobService'
import type { RequestWithId } from '../middleware/requestId'
import { requestLogger } from '../middleware/requestId'
import { ConfigurationError } from '../utils/errors'

const NO_CACHE_HEADERS = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  'Pragma': 'no-cache',
  'Expires': '0',
  'Surrogate-Control': 'no-store',
}

const submitSchema = z.object({
  locator: z.string({ required_error: 'locator is required' }),
  profiles: z.array(z.string()).optional(),
  preset: z.enum(['all', 'high-quality']).optional(),
  outputDirectory: z.string().optional(),
})

/** Content-Disposition filename: no CR/LF/control chars, quotes escaped, ASCII only. */
function attachmentName(filePath: string): string {
  const safeForHeader = path.basename(filePath).replace(/[\0\r\n]/g, '').replace(/"/g, '\\"')
  return safeForHeader.replace(/[^\x20-\x7E]/g, '_')
}

export function createJobRoutes(jobs: JobService): express.Router {
  const router = express.Router()

  // POST /api/jobs: accept or reject immediately; the conversion runs on the worker
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = submitSchema.safeParse(req.body)
      if (!parsed.success) {
        throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '))
      }
      const withId: RequestWithId = req
      const snapshot = await jobs.submit({ ...parsed.data, requestId: withId.requestId })
      requestLogger(req).info({ msg: 'Job accepted', jobId: snapshot.jobId, profiles: snapshot.profiles.length })
      res.setHeader('Location', `${req.baseUrl}/${snapshot.jobId}`)
      res.status(202).json({
        jobId: snapshot.jobId,
        status: snapshot.status,
        totalSteps: snapshot.totalSteps,
      })
    } catch (error) {
      next(error)
    }
  })

  // GET /api/jobs/:jobId: poll the latest snapshot
  router.get('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = await jobs.status(req.params.jobId)
      res.set(NO_CACHE_HEADERS)
      if (!snapshot) {
        return res.status(404).json({ message: 'Job not found' })
      }
      res.json(snapshot)
    } catch (error) {
      next(error)
    }
  })

  // GET /api/jobs/:jobId/archive: the zip, once the job completed
  router.get('/:jobId/archive', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const archivePath = await jobs.archive(req.params.jobId)
      if (!archivePath) {
        return res.status(404).json({ message: 'No files available for download' })
      }
      res.setHeader('Content-Disposition', `attachment; filename="${attachmentName(archivePath)}"`)
      res.setHeader('Content-Type', 'application/zip')
      const stream = fs.createReadStream(archivePath)
      stream.on('error', (err) => {
        requestLogger(req).error({ msg: 'Archive stream failed', err })
        if (!res.headersSent) next(err)
        else res.destroy(err)
      })
      stream.pipe(res)
    } catch (error) {
      next(error)
    }
  })

  return router
}
