/**
 * Runtime configuration, read once from process.env (after env.ts has loaded .env files).
 * Every value has a default so the API starts with no .env at all.
 */
import os from 'os'
import path from 'path'
import { z } from 'zod'
import type { SentryOptions } from './lib/sentry'

const intFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a non-negative integer')
    .transform((v) => parseInt(v, 10))
    .optional()
    .transform((v) => v ?? fallback)

const flagFromEnv = z
  .string()
  .optional()
  .transform((v) => /^(1|true|yes)$/i.test(v ?? ''))

const configSchema = z.object({
  PORT: intFromEnv(3001),
  NODE_ENV: z.string().default('development'),
  RELEASE: z.string().default('dev'),
  OUTPUT_ROOT: z.string().trim().min(1).default(path.join(os.tmpdir(), 'audio-derivatives')),
  JOB_BACKEND: z.enum(['memory', 'redis']).default('memory'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  WORKER_CONCURRENCY: intFromEnv(1).pipe(z.number().int().min(1)),
  DISABLE_WORKER: flagFromEnv,
  YTDLP_PATH: z.string().trim().min(1).default('yt-dlp'),
  FFMPEG_PATH: z.string().trim().optional(),
  FFMPEG_THREADS: intFromEnv(4).pipe(z.number().int().min(1)),
  ENCODER_STALL_MS: intFromEnv(90 * 1000),
  FILE_MAX_AGE_MS: intFromEnv(60 * 60 * 1000),
  CLEANUP_INTERVAL_MS: intFromEnv(60 * 60 * 1000),
  JOB_TTL_SEC: intFromEnv(24 * 60 * 60),
  SENTRY_DSN: z.string().trim().optional(),
  SENTRY_ENV: z.string().trim().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.05),
  CORS_ORIGINS: z
    .string()
    .optional()
    .transform((v) => (v ?? '').split(',').map((o) => o.trim()).filter(Boolean)),
})

export type AppConfig = z.infer<typeof configSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }
  return parsed.data
}

export function sentryOptions(config: AppConfig): SentryOptions {
  return {
    dsn: config.SENTRY_DSN || undefined,
    environment: config.SENTRY_ENV || config.NODE_ENV,
    release: config.RELEASE,
    tracesSampleRate: config.SENTRY_TRACES_SAMPLE_RATE,
  }
}

let cached: AppConfig | undefined

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig()
  return cached
}
