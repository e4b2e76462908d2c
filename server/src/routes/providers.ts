import express, { Request, Response } from 'express'
import type { ProviderRegistry } from '../providers/registry'
import type { ProviderLimiter } from '../providers/limiter'

/** GET /: registry snapshot with score, load and limiter state per provider */
export function createProviderRoutes(registry: ProviderRegistry, limiter: ProviderLimiter): express.Router {
  const router = express.Router()
  router.get('/', (_req: Request, res: Response) => {
    res.json({
      providers: registry.snapshot().map((p) => ({
        ...p,
        degradedUntil: p.degradedUntil !== null ? new Date(p.degradedUntil).toISOString() : null,
        lastCheckedAt: p.lastCheckedAt !== null ? new Date(p.lastCheckedAt).toISOString() : null,
        inFlight: limiter.inFlight(p.id),
        msUntilToken: limiter.msUntilToken(p.id),
        hasCapacity: limiter.hasCapacity(p.id),
      })),
    })
  })
  return router
}
