import type { Request, Response, NextFunction } from 'express'
import { OrchestratorError } from '../lib/errors'
import { withRequestId } from '../lib/logger'

/** Wrap an async route so a rejection reaches the error handler. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res).catch(next)
  }
}

/**
 * Last middleware, after the Sentry handler (which reports the unexpected ones). Deliberate errors map
 * to their status with `{ message, code, details? }`; anything else is logged and answered with a bare 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err)
    return
  }
  if (err instanceof OrchestratorError) {
    res.status(err.status).json({ message: err.message, code: err.code, ...(err.details ? { details: err.details } : {}) })
    return
  }
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ message: 'Request body is not valid JSON', code: 'VALIDATION_FAILED' })
    return
  }
  withRequestId(req.requestId).error({ msg: 'Unhandled API error', method: req.method, path: req.path, err })
  res.status(500).json({ message: 'Internal server error', code: 'INTERNAL_ERROR' })
}
