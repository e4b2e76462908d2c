/**
 * Single source of truth for task state. Every write goes through a compare-and-swap on `version`,
 * retried a bounded number of times, so racing writers to one task id are serialized and the first
 * terminal write wins. Listeners (webhook notifier, metrics) see each accepted change once, in order.
 */
import type { TaskEvent, TaskEventType, TaskRecord, TaskState } from '../models/Task'
import { canTransition, eventTypeForState, isTerminalState } from '../models/Task'
import type { TaskFilter, TaskRepository, TaskStats } from './repositories'
import { getLogger } from '../lib/logger'

const log = getLogger('worker')

export interface TaskChange {
  task: TaskRecord
  previous?: TaskRecord
  event: TaskEventType
}

export type TaskChangeListener = (change: TaskChange) => void

export type StoreFailureReason = 'not_found' | 'invalid_transition' | 'unexpected_state' | 'conflict' | 'noop'

export type StoreWriteResult =
  | { ok: true; task: TaskRecord; previous: TaskRecord }
  | { ok: false; reason: StoreFailureReason; task?: TaskRecord }

type Patch = Partial<Omit<TaskRecord, 'id' | 'version' | 'createdAt' | 'state'>>

export interface TransitionOptions {
  /** Only apply when the current state is one of these. */
  from?: readonly TaskState[]
  /** Extra precondition checked against the current record inside the CAS loop. */
  guard?: (current: TaskRecord) => boolean
  detail?: Record<string, unknown>
}

export interface TaskStoreOptions {
  now?: () => number
  maxCasRetries?: number
}

export class TaskStore {
  private readonly listeners = new Set<TaskChangeListener>()
  private readonly now: () => number
  private readonly maxCasRetries: number

  constructor(private readonly repo: TaskRepository, options: TaskStoreOptions = {}) {
    this.now = options.now ?? Date.now
    this.maxCasRetries = options.maxCasRetries ?? 8
  }

  onChange(listener: TaskChangeListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  async create(task: TaskRecord): Promise<TaskRecord> {
    await this.repo.insert(task)
    await this.recordEvent({ taskId: task.id, type: 'task.created', state: task.state, at: new Date(this.now()) })
    this.emit({ task, event: 'task.created' })
    return task
  }

  get(id: string): Promise<TaskRecord | undefined> {
    return this.repo.get(id)
  }

  getMany(ids: string[]): Promise<TaskRecord[]> {
    return this.repo.getMany(ids)
  }

  list(filter: TaskFilter): Promise<TaskRecord[]> {
    return this.repo.list(filter)
  }

  events(id: string): Promise<TaskEvent[]> {
    return this.repo.listEvents(id)
  }

  pruneTerminal(cutoff: Date): Promise<number> {
    return this.repo.deleteTerminalBefore(cutoff)
  }

  stats(): Promise<TaskStats> {
    return this.repo.stats()
  }

  /**
   * Move a task along an allowed edge. `patch` may be computed from the current record so it is
   * re-evaluated on every CAS retry.
   */
  async transition(
    id: string,
    to: TaskState,
    patch: Patch | ((current: TaskRecord) => Patch) = {},
    options: TransitionOptions = {}
  ): Promise<StoreWriteResult> {
    const result = await this.casLoop(id, (current) => {
      if (options.from && !options.from.includes(current.state)) return { reason: 'unexpected_state' }
      if (options.guard && !options.guard(current)) return { reason: 'unexpected_state' }
      if (!canTransition(current.state, to)) return { reason: 'invalid_transition' }
      const fields = typeof patch === 'function' ? patch(current) : patch
      return { next: { ...current, ...fields, state: to } }
    })
    if (result.ok) {
      const event = eventTypeForState(to, result.previous.state)
      await this.recordEvent({
        taskId: id,
        type: event,
        state: to,
        at: result.task.updatedAt,
        ...(options.detail ? { detail: options.detail } : {}),
      })
      this.emit({ task: result.task, previous: result.previous, event })
    }
    return result
  }

  /** Field update without a state change (cancel flag, retry bookkeeping). Refused on terminal tasks. */
  async patch(id: string, patch: Patch | ((current: TaskRecord) => Patch | null)): Promise<StoreWriteResult> {
    return this.casLoop(id, (current) => {
      if (isTerminalState(current.state)) return { reason: 'invalid_transition' }
      const fields = typeof patch === 'function' ? patch(current) : patch
      if (fields === null) return { reason: 'noop' }
      return { next: { ...current, ...fields } }
    })
  }

  /**
   * Apply a progress report. Ignored unless the task is processing, the sequence number is newer than
   * the last applied one and the value does not go backwards.
   */
  async applyProgress(id: string, progress: number, seq: number): Promise<boolean> {
    const value = Math.min(1, Math.max(0, progress))
    const result = await this.casLoop(id, (current) => {
      if (current.state !== 'processing') return { reason: 'unexpected_state' }
      if (seq <= current.progressSeq || value < current.progress) return { reason: 'noop' }
      return { next: { ...current, progress: value, progressSeq: seq } }
    })
    if (result.ok) this.emit({ task: result.task, previous: result.previous, event: 'task.progress' })
    return result.ok
  }

  /**
   * Explicit operator retry of a failed task: the only way out of a terminal state. Execution paths
   * never use it; they go through transition().
   */
  async requeueFailed(id: string, resetAttempts: boolean): Promise<StoreWriteResult> {
    const result = await this.casLoop(id, (current) => {
      if (current.state !== 'failed') return { reason: 'invalid_transition' }
      const now = new Date(this.now())
      return {
        next: {
          ...current,
          state: 'queued',
          attemptCount: resetAttempts ? 0 : current.attemptCount,
          attemptedProviders: resetAttempts ? [] : current.attemptedProviders,
          assignedProvider: undefined,
          lastError: undefined,
          errorCode: undefined,
          cancelRequested: false,
          progress: 0,
          output: undefined,
          completedAt: undefined,
          startedAt: undefined,
          notBefore: undefined,
          enqueuedAt: now,
        },
      }
    })
    if (result.ok) {
      await this.recordEvent({ taskId: id, type: 'task.retrying', state: 'queued', at: result.task.updatedAt, detail: { manual: true } })
      this.emit({ task: result.task, previous: result.previous, event: 'task.retrying' })
    }
    return result
  }

  private async casLoop(
    id: string,
    compute: (current: TaskRecord) => { next: TaskRecord } | { reason: StoreFailureReason }
  ): Promise<StoreWriteResult> {
    for (let attempt = 0; attempt <= this.maxCasRetries; attempt++) {
      const current = await this.repo.get(id)
      if (!current) return { ok: false, reason: 'not_found' }
      const computed = compute(current)
      if ('reason' in computed) return { ok: false, reason: computed.reason, task: current }
      const next: TaskRecord = {
        ...computed.next,
        id: current.id,
        createdAt: current.createdAt,
        updatedAt: new Date(Math.max(this.now(), current.updatedAt.getTime())),
        version: current.version + 1,
      }
      if (await this.repo.compareAndSet(next, current.version)) {
        return { ok: true, task: next, previous: current }
      }
    }
    log.warn({ msg: 'Task write gave up after repeated version conflicts', taskId: id })
    const latest = await this.repo.get(id)
    return { ok: false, reason: 'conflict', task: latest }
  }

  private async recordEvent(event: TaskEvent): Promise<void> {
    try {
      await this.repo.appendEvent(event)
    } catch (err) {
      // The event log is an audit trail; a failed append must not undo the state write
      log.error({ msg: 'Failed to append task event', taskId: event.taskId, event: event.type, err })
    }
  }

  private emit(change: TaskChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change)
      } catch (err) {
        log.error({ msg: 'Task change listener threw', taskId: change.task.id, event: change.event, err })
      }
    }
  }
}
