/**
 * Health, readiness and version endpoints (no /api prefix, no API key).
 */
import { Router, Request, Response } from 'express'
import { errorMessage } from '../lib/errors'
import { withTimeout } from '../lib/timeout'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const BUILD_TIME = process.env.BUILD_TIME || undefined

const READYZ_TIMEOUT_MS = 5_000

export interface HealthDeps {
  /** Database round trip; absent for the in-memory store. */
  ping?: () => Promise<void>
  /** Whether the scheduler loop is accepting work. */
  isStarted: () => boolean
}

export function createHealthRoutes(deps: HealthDeps): Router {
  const router = Router()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /readyz: 200 only when the scheduler runs and Postgres (if used) answers; 503 with details if not. */
  router.get('/readyz', async (_req: Request, res: Response) => {
    const errors: { database?: string; scheduler?: string } = {}
    if (deps.ping) {
      try {
        await withTimeout(deps.ping(), READYZ_TIMEOUT_MS, 'Postgres')
      } catch (err) {
        errors.database = errorMessage(err) || 'Postgres unreachable'
      }
    }
    if (!deps.isStarted()) errors.scheduler = 'not started'
    if (Object.keys(errors).length > 0) {
      res.status(503).json({ status: 'unhealthy', ...errors })
      return
    }
    res.status(200).json({ status: 'ok' })
  })

  /** GET /version: service, release, buildTime, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      service: 'media-task-orchestrator',
      release,
      buildTime: BUILD_TIME,
      env,
    })
  })

  return router
}
