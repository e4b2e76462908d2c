/**
 * Runs one attempt of one task on a leased provider and turns whatever happens into a state transition.
 * Nothing thrown in here reaches the scheduler: unexpected errors fail the task with INTERNAL_ERROR.
 *
 * Cancellation is cooperative. The flag is checked after dispatch, before the provider call, when the
 * call returns and before a retry re-queue. A call already sent is never aborted for a cancel; only
 * its result is dropped.
 */
import type { TaskErrorCode, TaskRecord, TaskType } from '../models/Task'
import type { MediaProvider } from '../models/Provider'
import type { TaskStore } from '../store/TaskStore'
import type { ProgressChannel } from '../store/progressChannel'
import type { ProviderRegistry } from '../providers/registry'
import type { ProviderLimiter } from '../providers/limiter'
import type { RetryPolicy } from '../lib/retryPolicy'
import {
  InsufficientCreditsError,
  PermanentProviderError,
  TransientProviderError,
  classifyProviderError,
  errorMessage,
  toProviderError,
} from '../lib/errors'
import { captureTaskError } from '../lib/sentry'
import { withTaskContext } from '../lib/logger'

export interface Lease {
  providerId: string
  provider: MediaProvider
}

export type ContentFilterResult = { allowed: true } | { allowed: false; reason: string }

/** Pre-dispatch hook; a rejection fails the task permanently with CONTENT_REJECTED. */
export type ContentFilter = (task: TaskRecord) => Promise<ContentFilterResult>

export type DispatchOutcome =
  | { kind: 'completed' }
  | { kind: 'failed'; code: TaskErrorCode }
  | { kind: 'cancelled' }
  | { kind: 'requeued'; task: TaskRecord; delayMs: number }
  /** The task was no longer dispatchable (cancelled or changed under us). */
  | { kind: 'skipped' }

export interface DispatcherOptions {
  store: TaskStore
  registry: ProviderRegistry
  limiter: ProviderLimiter
  progress: ProgressChannel
  retryPolicy: RetryPolicy
  timeoutsMs: Record<TaskType, number>
  contentFilter?: ContentFilter
  now?: () => number
}

export class Dispatcher {
  private readonly now: () => number

  constructor(private readonly options: DispatcherOptions) {
    this.now = options.now ?? Date.now
  }

  /**
   * Lease the best eligible provider with budget. Providers this task has not tried yet come first;
   * the caller's preferred provider leads within that group.
   */
  selectAndAcquire(task: TaskRecord): Lease | null {
    const { registry, limiter } = this.options
    const candidates = registry.list(task.type, { preferred: task.preferredProvider })
    const untried = candidates.filter((p) => !task.attemptedProviders.includes(p.id))
    const tried = candidates.filter((p) => task.attemptedProviders.includes(p.id))
    for (const provider of [...untried, ...tried]) {
      if (limiter.tryAcquire(provider.id)) return { providerId: provider.id, provider }
    }
    return null
  }

  /** Whether any provider could ever be leased for this type right now, ignoring limiter budget. */
  hasEligibleProvider(type: TaskType): boolean {
    return this.options.registry.hasEligible(type)
  }

  /** Execute one attempt. The lease is released exactly once before this resolves. */
  async execute(task: TaskRecord, lease: Lease): Promise<DispatchOutcome> {
    const log = withTaskContext(task.id, lease.providerId)
    let released = false
    const release = () => {
      if (released) return
      released = true
      this.options.limiter.release(lease.providerId)
    }
    try {
      return await this.run(task, lease, release)
    } catch (err) {
      log.error({ msg: 'Unexpected dispatcher error', err })
      captureTaskError(task.id, lease.providerId, err)
      release()
      return this.failUnexpected(task.id, err)
    } finally {
      release()
    }
  }

  private async run(queuedTask: TaskRecord, lease: Lease, release: () => void): Promise<DispatchOutcome> {
    const { store, registry, progress } = this.options
    const log = withTaskContext(queuedTask.id, lease.providerId)

    const dispatched = await store.transition(queuedTask.id, 'dispatched', { assignedProvider: lease.providerId }, {
      from: ['queued'],
      detail: { provider: lease.providerId },
    })
    if (!dispatched.ok) return { kind: 'skipped' }
    if (dispatched.task.cancelRequested) return this.cancel(queuedTask.id)

    if (this.options.contentFilter) {
      const verdict = await this.options.contentFilter(dispatched.task)
      if (!verdict.allowed) {
        log.info({ msg: 'Task rejected by content filter', reason: verdict.reason })
        return this.fail(queuedTask.id, 'CONTENT_REJECTED', verdict.reason)
      }
    }

    const started = await store.transition(
      queuedTask.id,
      'processing',
      (current) => ({
        attemptCount: current.attemptCount + 1,
        attemptedProviders: [...current.attemptedProviders, lease.providerId],
        startedAt: current.startedAt ?? new Date(this.now()),
      }),
      { from: ['dispatched'], guard: (current) => !current.cancelRequested, detail: { provider: lease.providerId } }
    )
    if (!started.ok) {
      if (started.task?.cancelRequested) return this.cancel(queuedTask.id)
      return { kind: 'skipped' }
    }
    const task = started.task
    log.info({ msg: 'Attempt started', attempt: task.attemptCount })

    const timeoutMs = task.timeoutMs ?? this.options.timeoutsMs[task.type]
    const startedAt = this.now()
    const call = await this.invoke(task, lease.provider, timeoutMs)
    const latencyMs = this.now() - startedAt
    await progress.close(task.id)
    release()

    if (call.ok) {
      registry.reportOutcome(lease.providerId, { success: true, latencyMs, cost: call.cost })
      return this.complete(task.id, call.output, call.cost)
    }

    const error = toProviderError(call.error, lease.providerId)
    const kind = classifyProviderError(error)
    log.warn({ msg: 'Attempt failed', attempt: task.attemptCount, kind, error: error.message })

    if (kind === 'transient') registry.reportOutcome(lease.providerId, { success: false, latencyMs })

    if (error instanceof InsufficientCreditsError) {
      registry.markOutOfCredit(lease.providerId)
      if (registry.hasEligible(task.type, [lease.providerId])) {
        return this.requeue(task.id, 0, error.message)
      }
      return this.fail(task.id, 'INSUFFICIENT_CREDITS', error.message)
    }
    if (error instanceof PermanentProviderError) {
      return this.fail(task.id, error.taskCode, error.message)
    }

    const policy = this.options.retryPolicy.withMaxAttempts(task.maxRetries + 1)
    const decision = policy.decide(task.attemptCount, error)
    if (decision.retry) return this.requeue(task.id, decision.delayMs, error.message)

    const code: TaskErrorCode =
      task.maxRetries > 0
        ? 'RETRIES_EXHAUSTED'
        : error instanceof TransientProviderError && error.reason === 'timeout'
          ? 'PROVIDER_TIMEOUT'
          : 'PROVIDER_UNAVAILABLE'
    return this.fail(task.id, code, error.message)
  }

  /** Provider call bounded by the attempt timeout, even when the binding ignores the abort signal. */
  private async invoke(
    task: TaskRecord,
    provider: MediaProvider,
    timeoutMs: number
  ): Promise<{ ok: true; output: unknown; cost?: number } | { ok: false; error: unknown }> {
    const controller = new AbortController()
    const timeoutError = new TransientProviderError('timeout', `${provider.id} timed out after ${timeoutMs}ms`)
    let timer: NodeJS.Timeout | undefined
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort(timeoutError)
        reject(timeoutError)
      }, timeoutMs)
    })
    try {
      const result = await Promise.race([
        provider.generate(task.input, {
          taskId: task.id,
          type: task.type,
          attempt: task.attemptCount,
          signal: controller.signal,
          reportProgress: this.options.progress.open(task.id, task.progressSeq),
        }),
        timedOut,
      ])
      return result.ok ? result : { ok: false, error: result.error }
    } catch (err) {
      return { ok: false, error: controller.signal.aborted ? timeoutError : err }
    } finally {
      clearTimeout(timer)
    }
  }

  private async complete(taskId: string, output: unknown, cost: number | undefined): Promise<DispatchOutcome> {
    const now = new Date(this.now())
    const result = await this.options.store.transition(
      taskId,
      'completed',
      { output, cost, progress: 1, completedAt: now, lastError: undefined, errorCode: undefined },
      { from: ['processing'], guard: (current) => !current.cancelRequested }
    )
    if (result.ok) return { kind: 'completed' }
    if (result.task?.cancelRequested && result.task.state === 'processing') return this.cancel(taskId)
    return result.task?.state === 'cancelled' ? { kind: 'cancelled' } : { kind: 'skipped' }
  }

  private async requeue(taskId: string, delayMs: number, message: string): Promise<DispatchOutcome> {
    const now = this.now()
    const result = await this.options.store.transition(
      taskId,
      'queued',
      {
        assignedProvider: undefined,
        lastError: message,
        progress: 0,
        enqueuedAt: new Date(now),
        notBefore: delayMs > 0 ? new Date(now + delayMs) : undefined,
      },
      { from: ['processing'], guard: (current) => !current.cancelRequested, detail: { delayMs, error: message } }
    )
    if (result.ok) return { kind: 'requeued', task: result.task, delayMs }
    if (result.task?.cancelRequested && result.task.state === 'processing') return this.cancel(taskId)
    return { kind: 'skipped' }
  }

  private async fail(taskId: string, code: TaskErrorCode, message: string): Promise<DispatchOutcome> {
    const result = await this.options.store.transition(
      taskId,
      'failed',
      { errorCode: code, lastError: message, completedAt: new Date(this.now()) },
      { detail: { code, error: message } }
    )
    if (result.ok) return { kind: 'failed', code }
    return result.task?.state === 'cancelled' ? { kind: 'cancelled' } : { kind: 'skipped' }
  }

  private async cancel(taskId: string): Promise<DispatchOutcome> {
    const result = await this.options.store.transition(
      taskId,
      'cancelled',
      { completedAt: new Date(this.now()) },
      { detail: { observedBy: 'dispatcher' } }
    )
    return result.ok || result.task?.state === 'cancelled' ? { kind: 'cancelled' } : { kind: 'skipped' }
  }

  private async failUnexpected(taskId: string, err: unknown): Promise<DispatchOutcome> {
    try {
      return await this.fail(taskId, 'INTERNAL_ERROR', errorMessage(err))
    } catch (writeErr) {
      withTaskContext(taskId).error({ msg: 'Could not record internal failure', err: writeErr })
      return { kind: 'skipped' }
    }
  }
}
