/**
 * Request ID middleware: read x-request-id from the edge or generate a UUID.
 * Attaches to request context and returns it in the response header for correlation (caller → API → worker).
 */
import type { Request, Response, NextFunction } from 'express'
import { v4 as uuidv4 } from 'uuid'

export const REQUEST_ID_HEADER = 'x-request-id'

declare global {
  namespace Express {
    interface Request {
      requestId?: string
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : uuidv4()
  req.requestId = id
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}
