import type { Request, Response, NextFunction, RequestHandler } from 'express'

/**
 * Trusted identity set by apiKeyAuth when a valid API key is present.
 * Routes scope tasks by this userId; never by a client-supplied header.
 */
export interface ApiKeyUser {
  userId: string
}

declare global {
  namespace Express {
    interface Request {
      apiKeyUser?: ApiKeyUser
    }
  }
}

/**
 * API key store from env. Format: API_KEYS=key1:userId1,key2:userId2
 * Or single key: API_KEY=secret (maps to userId "api-user")
 */
export function parseApiKeys(env: Record<string, string | undefined> = process.env): Map<string, string> {
  const keyToUser = new Map<string, string>()
  if (env.API_KEY?.trim()) {
    keyToUser.set(env.API_KEY.trim(), 'api-user')
  }
  const keysEnv = env.API_KEYS
  if (keysEnv) {
    keysEnv.split(',').forEach((pair) => {
      const [key, userId] = pair.trim().split(':')
      if (key && userId) keyToUser.set(key.trim(), userId.trim())
    })
  }
  return keyToUser
}

function readKey(req: Request): string | undefined {
  const header = req.headers['x-api-key']
  const apiKey = typeof header === 'string' ? header.trim() : undefined
  if (apiKey) return apiKey
  const authHeader = req.headers.authorization
  return authHeader?.startsWith('Bearer ') ? authHeader.slice(7).trim() : undefined
}

/**
 * Middleware: Authorization: Bearer <key> or X-Api-Key: <key>. With no keys configured the API is open
 * (local development) and requests carry no identity; otherwise a missing or unknown key is a 401.
 */
export function apiKeyAuth(keyToUser: Map<string, string>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (keyToUser.size === 0) return next()
    const key = readKey(req)
    const userId = key ? keyToUser.get(key) : undefined
    if (!userId) {
      res.status(401).json({ message: 'Missing or invalid API key', code: 'UNAUTHORIZED' })
      return
    }
    req.apiKeyUser = { userId }
    next()
  }
}
