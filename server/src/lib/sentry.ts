/**
 * Sentry for API and worker: errors + performance. Enabled only when SENTRY_DSN is set.
 * Env: SENTRY_DSN, SENTRY_ENV (default NODE_ENV), SENTRY_TRACES_SAMPLE_RATE (default 0.05), RELEASE.
 * Uses @sentry/node v8: setupExpressErrorHandler(app) after routes; no request handler (auto-instrumentation).
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import '../middleware/requestId'
import { getLogger } from './logger'

const DSN = process.env.SENTRY_DSN
const ENV = process.env.SENTRY_ENV || process.env.NODE_ENV || 'development'
const RELEASE = process.env.RELEASE || undefined
const TRACES_SAMPLE_RATE = Math.min(
  1,
  Math.max(0, parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.05') || 0.05)
)

function sentryEnabled(): boolean {
  return Boolean(DSN?.trim())
}

export function initSentry(): void {
  if (!sentryEnabled()) return
  try {
    Sentry.init({
      dsn: DSN,
      environment: ENV,
      release: RELEASE,
      tracesSampleRate: TRACES_SAMPLE_RATE,
      integrations: [Sentry.expressIntegration()],
    })
  } catch (err) {
    getLogger('api').warn({ msg: 'Sentry init failed', err })
  }
}

/** Call after all routes. No-op if SENTRY_DSN not set. */
export function setupSentryErrorHandler(app: Express): void {
  if (!sentryEnabled()) return
  Sentry.setupExpressErrorHandler(app)
}

/** Set requestId on Sentry scope for correlation. Run after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  const id = req.requestId
  if (id && sentryEnabled()) Sentry.getCurrentScope().setTag('request_id', id)
  next()
}

/** Capture an unexpected dispatcher/worker exception with task and provider tags. */
export function captureTaskError(taskId: string, providerId: string | undefined, err: unknown): void {
  if (!sentryEnabled()) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('task_id', taskId)
    if (providerId) scope.setTag('provider_id', providerId)
    Sentry.captureException(err)
  })
}
