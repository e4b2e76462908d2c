import type { TaskErrorCode } from '../models/Task'

/** Base for every error the orchestrator raises on purpose. `status` is the HTTP status routes answer with. */
export class OrchestratorError extends Error {
  readonly code: string
  readonly status: number
  readonly details?: Record<string, unknown>

  constructor(code: string, message: string, status = 500, details?: Record<string, unknown>) {
    super(message)
    this.name = 'OrchestratorError'
    this.code = code
    this.status = status
    this.details = details
  }
}

export class ValidationError extends OrchestratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_FAILED', message, 400, details)
    this.name = 'ValidationError'
  }
}

export class TaskNotFoundError extends OrchestratorError {
  constructor(taskId: string) {
    super('TASK_NOT_FOUND', `Task ${taskId} not found`, 404)
    this.name = 'TaskNotFoundError'
  }
}

export class BatchNotFoundError extends OrchestratorError {
  constructor(batchId: string) {
    super('BATCH_NOT_FOUND', `Batch ${batchId} not found`, 404)
    this.name = 'BatchNotFoundError'
  }
}

export class BatchTooLargeError extends OrchestratorError {
  constructor(size: number, max: number) {
    super('BATCH_TOO_LARGE', `Batch of ${size} requests exceeds the maximum of ${max}`, 400, { size, max })
    this.name = 'BatchTooLargeError'
  }
}

/** Cancellation arrived after the task already reached completed or failed. */
export class TooLateError extends OrchestratorError {
  constructor(taskId: string, state: string) {
    super('TOO_LATE', `Task ${taskId} is already ${state}`, 409, { state })
    this.name = 'TooLateError'
  }
}

export class InvalidStateError extends OrchestratorError {
  constructor(taskId: string, state: string, action: string) {
    super('INVALID_STATE', `Cannot ${action} task ${taskId} in state ${state}`, 409, { state })
    this.name = 'InvalidStateError'
  }
}

export type TransientReason = 'timeout' | 'server_error' | 'rate_limited' | 'network'

export class TransientProviderError extends OrchestratorError {
  readonly reason: TransientReason

  constructor(reason: TransientReason, message: string) {
    super('PROVIDER_TRANSIENT', message, 502, { reason })
    this.name = 'TransientProviderError'
    this.reason = reason
  }
}

export class PermanentProviderError extends OrchestratorError {
  readonly taskCode: TaskErrorCode

  constructor(message: string, taskCode: TaskErrorCode = 'PROVIDER_REJECTED') {
    super('PROVIDER_PERMANENT', message, 422)
    this.name = 'PermanentProviderError'
    this.taskCode = taskCode
  }
}

export class InsufficientCreditsError extends OrchestratorError {
  constructor(providerId: string) {
    super('INSUFFICIENT_CREDITS', `Provider ${providerId} has no credits left`, 402)
    this.name = 'InsufficientCreditsError'
  }
}

export class ResourceExhaustionError extends OrchestratorError {
  constructor(message: string) {
    super('NO_PROVIDER_AVAILABLE', message, 503)
    this.name = 'ResourceExhaustionError'
  }
}

export class WebhookDeliveryError extends OrchestratorError {
  readonly statusCode?: number

  constructor(message: string, statusCode?: number) {
    super('WEBHOOK_DELIVERY_FAILED', message, 502, statusCode ? { statusCode } : undefined)
    this.name = 'WebhookDeliveryError'
    this.statusCode = statusCode
  }
}

export type ProviderErrorClass = 'transient' | 'permanent' | 'credits'

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'EPIPE', 'UND_ERR_SOCKET'])

function readNumberField(value: object, key: string): number | undefined {
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'number' ? field : undefined
}

function readStringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'string' ? field : undefined
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Map anything a provider binding throws or returns onto the retry taxonomy.
 * Unknown errors are treated as transient so a flaky backend gets another attempt.
 */
export function classifyProviderError(error: unknown): ProviderErrorClass {
  if (error instanceof InsufficientCreditsError) return 'credits'
  if (error instanceof TransientProviderError) return 'transient'
  if (error instanceof PermanentProviderError || error instanceof ValidationError) return 'permanent'
  if (typeof error !== 'object' || error === null) return 'transient'

  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) return 'transient'

  const code = readStringField(error, 'code')
  if (code && NETWORK_CODES.has(code)) return 'transient'
  if (code === 'insufficient_quota') return 'credits'

  const status = readNumberField(error, 'status') ?? readNumberField(error, 'statusCode')
  if (status !== undefined) {
    if (status === 402) return 'credits'
    if (status === 408 || status === 429 || status >= 500) return 'transient'
    if (status >= 400) return 'permanent'
  }
  return 'transient'
}

/** Normalize into a TransientProviderError/PermanentProviderError/InsufficientCreditsError. */
export function toProviderError(error: unknown, providerId: string): OrchestratorError {
  if (
    error instanceof TransientProviderError ||
    error instanceof PermanentProviderError ||
    error instanceof InsufficientCreditsError
  ) {
    return error
  }
  const message = errorMessage(error)
  switch (classifyProviderError(error)) {
    case 'credits':
      return new InsufficientCreditsError(providerId)
    case 'permanent':
      return new PermanentProviderError(message)
    case 'transient': {
      if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        return new TransientProviderError('timeout', message)
      }
      const status = typeof error === 'object' && error !== null ? readNumberField(error, 'status') : undefined
      const reason: TransientReason =
        status === 429 ? 'rate_limited' : status !== undefined && status >= 500 ? 'server_error' : 'network'
      return new TransientProviderError(reason, message)
    }
  }
}
