/**
 * Structured JSON logger for API, worker and webhook delivery. Single format: level, timestamp, service, env, release,
 * requestId/taskId. Redacts webhook secrets and provider keys. LOG_LEVEL=silent turns it off (tests).
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info')

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'authorization',
  'webhookSecret',
  'webhook_secret',
  '*.webhookSecret',
  'secret',
  'req.headers.authorization',
  'req.headers["x-api-key"]',
  'OPENAI_API_KEY',
  'WEBHOOK_DEFAULT_SECRET',
  'REDIS_URL',
  'DATABASE_URL',
]

export type ServiceName = 'api' | 'worker' | 'webhook'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

const loggers = new Map<ServiceName, pino.Logger>()

export function getLogger(service: ServiceName): pino.Logger {
  let logger = loggers.get(service)
  if (!logger) {
    logger = createBaseLogger(service)
    loggers.set(service, logger)
  }
  return logger
}

/** Child logger with requestId (API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Child logger with taskId and, once chosen, the provider handling the attempt. */
export function withTaskContext(taskId: string, providerId?: string): pino.Logger {
  return getLogger('worker').child({ taskId, providerId: providerId || undefined })
}
