import Redis from 'ioredis'
import { getLogger } from '../lib/logger'

/**
 * Create a Redis client for Bull and the job store. Works with both:
 * - Self-hosted Redis: redis://host:6379 (or redis://redis:6379 in Docker)
 * - TLS providers: rediss://...
 *
 * Bull requires enableReadyCheck: false and maxRetriesPerRequest: null on its subscriber/bclient connections.
 */
let redisConnectionLogged = false

export function createRedisClient(redisUrl: string): Redis {
  if (!redisConnectionLogged) {
    redisConnectionLogged = true
    const kind = redisUrl.startsWith('rediss://') ? 'TLS' : 'plain TCP'
    getLogger('api').info({ msg: 'Redis connection', kind })
  }
  return new Redis(redisUrl, {
    ...(redisUrl.startsWith('rediss://') ? { tls: {} } : {}),
    enableReadyCheck: false,
    maxRetriesPerRequest: null,
  })
}
