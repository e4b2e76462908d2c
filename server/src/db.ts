import { Pool } from 'pg'
import type { Repositories } from './store/repositories'
import { createMemoryRepositories } from './store/memory'
import { applySchema, createPgRepositories } from './store/postgres'
import { getLogger } from './lib/logger'

const log = getLogger('api')

/**
 * Postgres when DATABASE_URL is set (schema applied idempotently), in-memory otherwise.
 * In-memory state is lost on restart; fine for local development only.
 */
export async function openRepositories(databaseUrl: string | undefined): Promise<Repositories> {
  if (!databaseUrl) {
    log.warn({ msg: 'DATABASE_URL not set; using in-memory task store' })
    return createMemoryRepositories()
  }
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    ...(databaseUrl.includes('sslmode=require') ? { ssl: { rejectUnauthorized: false } } : {}),
  })
  pool.on('error', (err) => {
    log.error({ msg: 'Postgres pool error', err })
  })
  await applySchema(pool)
  log.info({ msg: 'Postgres task store ready' })
  return createPgRepositories(pool)
}
