import express from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import type { Orchestrator } from './services/orchestrator'
import { createTaskRoutes } from './routes/tasks'
import { createBatchRoutes } from './routes/batch'
import { createProviderRoutes } from './routes/providers'
import { createWebhookRoutes } from './routes/webhooks'
import { createHealthRoutes } from './routes/health'
import { apiKeyAuth } from './utils/apiKey'
import { requestIdMiddleware } from './middleware/requestId'
import { errorHandler } from './middleware/errorHandler'
import { sentryRequestIdScope, setupSentryErrorHandler } from './lib/sentry'

export interface AppOptions {
  /** API key -> userId; empty leaves /api open. */
  apiKeys: Map<string, string>
  /** Exact origins allowed by CORS; localhost is added outside production. */
  corsOrigins: string[]
  /** Requests per minute per client across /api. */
  rateLimitPerMinute?: number
}

function normalizeOrigin(origin: string): string {
  return origin.trim().replace(/\/$/, '')
}

/** In dev, allow any origin that is localhost, 127.0.0.1, or [::1] (any port). */
function isLocalOrigin(origin: string): boolean {
  try {
    const host = new URL(origin).hostname.toLowerCase()
    return host === 'localhost' || host === '127.0.0.1' || host === '[::1]' || host === '::1'
  } catch {
    return false
  }
}

export function createApp(orchestrator: Orchestrator, options: AppOptions): express.Express {
  const app = express()
  app.disable('etag')
  // Trust one proxy hop so rate-limit keys on the client address, not the load balancer
  app.set('trust proxy', 1)

  const allowedOrigins = new Set(options.corsOrigins.map(normalizeOrigin))
  const isAllowedOrigin = (origin?: string) => {
    if (!origin) return true // curl, server-to-server
    const norm = normalizeOrigin(origin)
    if (allowedOrigins.has(norm)) return true
    return process.env.NODE_ENV !== 'production' && isLocalOrigin(norm)
  }
  app.use(
    cors({
      origin: (origin, callback) => callback(null, isAllowedOrigin(origin)),
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Api-Key', 'X-Request-Id'],
      exposedHeaders: ['X-Request-Id'],
      optionsSuccessStatus: 204,
    })
  )

  // Request ID: correlate caller -> API -> worker logs
  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(express.json({ limit: '1mb' }))

  const generalLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: options.rateLimitPerMinute ?? 120,
    message: { message: 'Too many requests. Please wait.', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  })
  app.use('/api', generalLimiter)
  app.use('/api', apiKeyAuth(options.apiKeys))

  app.use('/api/tasks', createTaskRoutes(orchestrator.tasks))
  app.use('/api/batch', createBatchRoutes(orchestrator.batches))
  app.use('/api/providers', createProviderRoutes(orchestrator.registry, orchestrator.limiter))
  app.use('/api/webhooks', createWebhookRoutes(orchestrator.notifier))

  app.use(
    createHealthRoutes({
      ping: orchestrator.repositories.ping,
      isStarted: () => orchestrator.scheduler.isStarted(),
    })
  )

  app.use('/api', (_req, res) => {
    res.status(404).json({ message: 'Not found', code: 'NOT_FOUND' })
  })

  // Sentry error handler after all routes; it reports and passes the error on
  setupSentryErrorHandler(app)
  app.use(errorHandler)

  return app
}
