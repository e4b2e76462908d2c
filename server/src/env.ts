/**
 * Load env so DATABASE_URL, REDIS_URL and provider keys are set before config is read.
 * Must be the first import in index.ts.
 */
import 'dotenv/config'
import path from 'path'
import fs from 'fs'
import { config as loadEnvFile } from 'dotenv'

// Project root .env; try cwd then __dirname so it works regardless of how the server is started
const rootEnvCwd = path.join(process.cwd(), '..', '.env')
const rootEnvDir = path.join(__dirname, '..', '..', '.env')
const rootEnv = fs.existsSync(rootEnvCwd) ? rootEnvCwd : fs.existsSync(rootEnvDir) ? rootEnvDir : null
if (rootEnv) {
  loadEnvFile({ path: rootEnv, override: false })
}

// When running on host (not in Docker), redis://redis:6379 won't resolve; use localhost.
const inDocker = fs.existsSync('/.dockerenv')
if (process.env.REDIS_URL === 'redis://redis:6379' && !inDocker) {
  process.env.REDIS_URL = 'redis://localhost:6379'
}
