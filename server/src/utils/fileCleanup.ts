import fs from 'fs'
import path from 'path'
import { getLogger } from '../lib/logger'
import type { InMemoryJobStore } from '../models/jobStore'

export interface CleanupOptions {
  outputRoot: string
  maxAgeMs: number
  intervalMs: number
  /** In-memory snapshots of the same age are pruned along with their files. */
  store?: InMemoryJobStore
}

/** Delete job outputs under outputRoot whose mtime is older than maxAgeMs. Returns the deleted names. */
export function cleanupOutputs(outputRoot: string, maxAgeMs: number, now = Date.now()): string[] {
  const log = getLogger('worker')
  if (!fs.existsSync(outputRoot)) {
    return []
  }

  const deleted: string[] = []
  for (const entry of fs.readdirSync(outputRoot)) {
    const entryPath = path.join(outputRoot, entry)
    try {
      const stats = fs.lstatSync(entryPath)
      if (stats.isSymbolicLink()) {
        continue
      }
      if (now - stats.mtimeMs <= maxAgeMs) {
        continue
      }
      fs.rmSync(entryPath, { recursive: true, force: true })
      deleted.push(entry)
    } catch (err) {
      log.error({ msg: 'Error cleaning up output', entry, err })
    }
  }

  if (deleted.length > 0) {
    log.info({ msg: 'Output cleanup', deleted: deleted.length })
  }
  return deleted
}

/** Run cleanup now and then every intervalMs. Returns a stop function. */
export function startFileCleanup(options: CleanupOptions): () => void {
  const run = () => {
    cleanupOutputs(options.outputRoot, options.maxAgeMs)
    options.store?.prune(new Date(Date.now() - options.maxAgeMs))
  }
  run()
  const timer = setInterval(run, options.intervalMs)
  timer.unref()
  return () => clearInterval(timer)
}
