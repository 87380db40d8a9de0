/**
 * Load env before config/redis are read.
 * Must be the first import in index.ts and in the standalone worker.
 */
import 'dotenv/config'
import { config as loadEnv } from 'dotenv'
import path from 'path'
import fs from 'fs'

// Project root .env (one level above server/) when started from server/
const rootEnvCwd = path.join(process.cwd(), '..', '.env')
const rootEnvDir = path.join(__dirname, '..', '..', '.env')
const rootEnv = fs.existsSync(rootEnvCwd) ? rootEnvCwd : fs.existsSync(rootEnvDir) ? rootEnvDir : null
if (rootEnv) {
  loadEnv({ path: rootEnv, override: false })
}

// When running on host (not in Docker), redis://redis:6379 does not resolve, so use localhost.
const inDocker = fs.existsSync('/.dockerenv')
if (process.env.REDIS_URL === 'redis://redis:6379' && !inDocker) {
  process.env.REDIS_URL = 'redis://localhost:6379'
}
