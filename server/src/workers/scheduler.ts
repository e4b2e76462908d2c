/**
 * Ready queue and admission loop. Ordered by (aged first, effective priority desc, enqueuedAt asc).
 * Effective priority starts at the task's band. The aging pass marks a task aged once it has waited past
 * the threshold, which puts it ahead of every task that has not, and raises its band by one per pass so
 * aged tasks still order among themselves. Admission is event-driven:
 * enqueue, limiter release, execution end, backoff expiry and aging passes all wake it. While work is
 * blocked on provider budget it also re-checks on a capped exponential poll.
 */
import type { TaskRecord, TaskState, TaskType } from '../models/Task'
import { MAX_PRIORITY_RANK, PRIORITY_RANK } from '../models/Task'
import type { SchedulerConfig } from '../config'
import type { TaskStore } from '../store/TaskStore'
import type { ProviderLimiter } from '../providers/limiter'
import type { DispatchOutcome, Dispatcher } from './dispatcher'
import { ResourceExhaustionError } from '../lib/errors'
import { getLogger, withTaskContext } from '../lib/logger'

const log = getLogger('worker')

const ACTIVE_STATES: TaskState[] = ['queued', 'dispatched', 'processing']

interface ReadyEntry {
  task: TaskRecord
  rank: number
  /** Waited past the aging threshold; set by the aging pass. */
  aged: boolean
  enqueuedAt: number
  notBefore: number
  /** First time admission found no eligible provider at all for the task's type. */
  noProviderSince: number | null
}

export interface SchedulerOptions {
  store: TaskStore
  dispatcher: Dispatcher
  limiter: ProviderLimiter
  config: SchedulerConfig
  now?: () => number
}

export class Scheduler {
  private readonly ready = new Map<string, ReadyEntry>()
  private readonly inflight = new Map<string, Promise<void>>()
  private readonly now: () => number
  private started = false
  private admitting = false
  private admitAgain = false
  private pollDelayMs: number
  private pollTimer: NodeJS.Timeout | null = null
  private backoffTimer: NodeJS.Timeout | null = null
  private backoffDueAt: number | null = null
  private agingTimer: NodeJS.Timeout | null = null
  private unsubscribeRelease: (() => void) | null = null

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? Date.now
    this.pollDelayMs = options.config.minPollIntervalMs
  }

  start(): void {
    if (this.started) return
    this.started = true
    this.unsubscribeRelease = this.options.limiter.onRelease(() => this.wake())
    this.agingTimer = setInterval(() => this.agingPass(), this.options.config.agingIntervalMs)
    this.agingTimer.unref()
    log.info({ msg: 'Scheduler started', queued: this.ready.size, workers: this.options.config.workerConcurrency })
    this.wake()
  }

  /** Stop admitting and wait for in-flight executions to settle. Queued tasks stay persisted as queued. */
  async stop(): Promise<void> {
    this.started = false
    this.unsubscribeRelease?.()
    this.unsubscribeRelease = null
    for (const timer of [this.pollTimer, this.backoffTimer, this.agingTimer]) {
      if (timer) clearTimeout(timer)
    }
    this.pollTimer = null
    this.backoffTimer = null
    this.backoffDueAt = null
    this.agingTimer = null
    await Promise.all(this.inflight.values())
  }

  enqueue(task: TaskRecord): void {
    const rank = PRIORITY_RANK[task.priority]
    this.ready.set(task.id, {
      task,
      rank,
      aged: false,
      enqueuedAt: task.enqueuedAt.getTime(),
      notBefore: task.notBefore?.getTime() ?? 0,
      noProviderSince: null,
    })
    this.wake()
  }

  remove(taskId: string): boolean {
    return this.ready.delete(taskId)
  }

  has(taskId: string): boolean {
    return this.ready.has(taskId)
  }

  /** 1-based place in the ready queue, or undefined when the task is not waiting. */
  position(taskId: string): number | undefined {
    const index = this.ordered().findIndex((e) => e.task.id === taskId)
    return index === -1 ? undefined : index + 1
  }

  size(): number {
    return this.ready.size
  }

  running(): number {
    return this.inflight.size
  }

  isStarted(): boolean {
    return this.started
  }

  /**
   * Re-queue persisted non-terminal work after a restart. Tasks caught mid-attempt go back to queued
   * (or to cancelled, when a cancel was pending).
   */
  async restore(): Promise<number> {
    const tasks = await this.options.store.list({ states: ACTIVE_STATES })
    let restored = 0
    for (const task of tasks.reverse()) {
      let current: TaskRecord | undefined = task
      if (task.state !== 'queued') {
        const target = task.cancelRequested ? 'cancelled' : 'queued'
        const result = await this.options.store.transition(
          task.id,
          target,
          target === 'queued'
            ? { assignedProvider: undefined, progress: 0, enqueuedAt: new Date(this.now()) }
            : { completedAt: new Date(this.now()) },
          { from: ['dispatched', 'processing'], detail: { restored: true } }
        )
        current = result.ok && result.task.state === 'queued' ? result.task : undefined
      }
      if (current) {
        this.enqueue(current)
        restored += 1
      }
    }
    if (restored > 0) log.info({ msg: 'Restored queued tasks', count: restored })
    return restored
  }

  /** Age every waiting task older than the threshold and promote it one band, then re-run admission. */
  agingPass(): void {
    const now = this.now()
    const { agingThresholdMs } = this.options.config
    for (const entry of this.ready.values()) {
      if (now - entry.enqueuedAt > agingThresholdMs) {
        entry.aged = true
        if (entry.rank < MAX_PRIORITY_RANK) entry.rank += 1
      }
      this.checkProviderWait(entry, now)
    }
    this.wake()
  }

  private ordered(): ReadyEntry[] {
    return [...this.ready.values()].sort(
      (a, b) => Number(b.aged) - Number(a.aged) || b.rank - a.rank || a.enqueuedAt - b.enqueuedAt
    )
  }

  private wake(): void {
    if (!this.started) return
    if (this.admitting) {
      this.admitAgain = true
      return
    }
    this.admitting = true
    try {
      do {
        this.admitAgain = false
        this.admit()
      } while (this.admitAgain && this.started)
    } finally {
      this.admitting = false
    }
  }

  private admit(): void {
    const { dispatcher, config } = this.options
    const now = this.now()
    const blockedTypes = new Set<TaskType>()
    let earliestBackoff: number | null = null
    let blocked = false
    let admitted = false

    for (const entry of this.ordered()) {
      if (this.inflight.size >= config.workerConcurrency) break
      if (entry.notBefore > now) {
        earliestBackoff = earliestBackoff === null ? entry.notBefore : Math.min(earliestBackoff, entry.notBefore)
        continue
      }
      if (blockedTypes.has(entry.task.type)) continue

      const lease = dispatcher.selectAndAcquire(entry.task)
      if (!lease) {
        blockedTypes.add(entry.task.type)
        blocked = true
        this.checkProviderWait(entry, now)
        continue
      }
      entry.noProviderSince = null
      this.ready.delete(entry.task.id)
      admitted = true
      this.launch(entry.task, dispatcher.execute(entry.task, lease))
    }

    if (earliestBackoff !== null) this.armBackoff(earliestBackoff)
    if (admitted) this.pollDelayMs = config.minPollIntervalMs
    if (blocked && !admitted) this.armPoll()
  }

  private launch(task: TaskRecord, execution: Promise<DispatchOutcome>): void {
    const tracked = execution
      .then((outcome) => {
        if (outcome.kind === 'requeued') this.enqueue(outcome.task)
      })
      .catch((err) => {
        withTaskContext(task.id).error({ msg: 'Execution settled with an error', err })
      })
      .finally(() => {
        this.inflight.delete(task.id)
        this.wake()
      })
    this.inflight.set(task.id, tracked)
  }

  private checkProviderWait(entry: ReadyEntry, now: number): void {
    if (this.options.dispatcher.hasEligibleProvider(entry.task.type)) {
      entry.noProviderSince = null
      return
    }
    entry.noProviderSince ??= now
    if (now - entry.noProviderSince > this.options.config.noProviderMaxWaitMs) {
      this.ready.delete(entry.task.id)
      void this.failUnadmittable(entry.task, now - entry.noProviderSince)
    }
  }

  private async failUnadmittable(task: TaskRecord, waitedMs: number): Promise<void> {
    const exhausted = new ResourceExhaustionError(
      `No provider available for ${task.type} after waiting ${Math.round(waitedMs / 1000)}s`
    )
    try {
      await this.options.store.transition(
        task.id,
        'failed',
        { errorCode: 'NO_PROVIDER_AVAILABLE', lastError: exhausted.message, completedAt: new Date(this.now()) },
        { from: ['queued'], detail: { code: exhausted.code } }
      )
      withTaskContext(task.id).warn({ msg: 'Task failed: no provider available', waitedMs, err: exhausted })
    } catch (err) {
      withTaskContext(task.id).error({ msg: 'Could not fail unadmittable task', err })
    }
  }

  private armBackoff(dueAt: number): void {
    if (this.backoffDueAt !== null && this.backoffDueAt <= dueAt) return
    if (this.backoffTimer) clearTimeout(this.backoffTimer)
    this.backoffDueAt = dueAt
    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = null
      this.backoffDueAt = null
      this.wake()
    }, Math.max(0, dueAt - this.now()))
    this.backoffTimer.unref()
  }

  private armPoll(): void {
    if (this.pollTimer) return
    const delay = this.pollDelayMs
    this.pollDelayMs = Math.min(this.options.config.maxPollIntervalMs, this.pollDelayMs * 2)
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null
      this.wake()
    }, delay)
    this.pollTimer.unref()
  }
}
