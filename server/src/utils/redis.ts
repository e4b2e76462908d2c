import Redis from 'ioredis'
import type { RedisOptions } from 'ioredis'
import { getLogger } from '../lib/logger'

/**
 * Redis client factory for Bull. Works with both:
 * - Self-hosted Redis: redis://host:6379 (or redis://redis:6379 in Docker)
 * - TLS endpoints (e.g. Upstash): rediss://...
 *
 * Bull requires enableReadyCheck: false and maxRetriesPerRequest: null on subscriber/bclient connections;
 * they are set for all three so one options object serves every connection type.
 */
export function redisClientFactory(redisUrl: string): (type: 'client' | 'subscriber' | 'bclient') => Redis {
  const options: RedisOptions = {
    ...(redisUrl.startsWith('rediss://') ? { tls: {} } : {}),
    enableReadyCheck: false,
    maxRetriesPerRequest: null,
  }
  let logged = false
  return (type) => {
    if (!logged) {
      logged = true
      const kind = redisUrl.startsWith('rediss://') ? 'TLS' : 'plain TCP'
      getLogger('webhook').info({ msg: `Redis: using ${kind} for webhook delivery queue` })
    }
    const client = new Redis(redisUrl, options)
    client.on('error', (err) => getLogger('webhook').error({ msg: 'Redis connection error', type, err }))
    return client
  }
}
