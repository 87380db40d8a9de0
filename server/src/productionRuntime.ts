import type { AppConfig } from './config'
import type { JobStore } from './models/Job'
import { InMemoryJobStore, RedisJobStore } from './models/jobStore'
import { defaultRegistry } from './models/Profile'
import { FfmpegEncoder, resolveFfmpegPath } from './services/ffmpeg'
import { YtDlpAcquirer } from './services/ytdlp'
import type { JobQueue } from './workers/jobQueue'
import { BullJobQueue, InProcessJobQueue } from './workers/jobQueue'
import { createRedisClient } from './utils/redis'
import type { Runtime } from './runtime'
import { assembleRuntime } from './runtime'

/** Production wiring: yt-dlp + ffmpeg, and either the in-process or the Redis/Bull backend. */
export function createRuntime(config: AppConfig): Runtime {
  const ffmpegPath = resolveFfmpegPath(config.FFMPEG_PATH)
  const acquirer = new YtDlpAcquirer({ binary: config.YTDLP_PATH, ffmpegPath })
  const encoder = new FfmpegEncoder({
    ffmpegPath,
    threads: config.FFMPEG_THREADS,
    stallMs: config.ENCODER_STALL_MS,
    registry: defaultRegistry,
  })

  let store: JobStore
  let queue: JobQueue
  let onClose: (() => Promise<void>) | undefined
  if (config.JOB_BACKEND === 'redis') {
    const redis = createRedisClient(config.REDIS_URL)
    store = new RedisJobStore(redis, config.JOB_TTL_SEC)
    queue = new BullJobQueue(config.REDIS_URL, config.WORKER_CONCURRENCY)
    onClose = async () => {
      await redis.quit()
    }
  } else {
    store = new InMemoryJobStore()
    queue = new InProcessJobQueue()
  }

  return assembleRuntime({
    registry: defaultRegistry,
    store,
    queue,
    acquirer,
    encoder,
    outputRoot: config.OUTPUT_ROOT,
    checkTools: () => Promise.all([acquirer.check(), encoder.check()]),
    cleanup: { maxAgeMs: config.FILE_MAX_AGE_MS, intervalMs: config.CLEANUP_INTERVAL_MS },
    onClose,
  })
}
