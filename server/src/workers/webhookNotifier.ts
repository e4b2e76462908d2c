/**
 * Signed, at-least-once webhook delivery of task lifecycle events. Only the oldest open delivery of a
 * task is ever scheduled, so a task's events reach the receiver in the order they were generated.
 * Which delivery is the oldest open one is always read from the repository, so a delivery finished by
 * another process still moves its task's queue along.
 * Delivery failures stay here: they are recorded on the delivery and never touch task state.
 */
import { v4 as uuidv4 } from 'uuid'
import type { TaskEventType, TaskRecord } from '../models/Task'
import { isTerminalState } from '../models/Task'
import type { WebhookDelivery, WebhookPayload, WebhookSummary } from '../models/WebhookDelivery'
import { summarizeDeliveries } from '../models/WebhookDelivery'
import type { DeliveryRepository } from '../store/repositories'
import type { TaskChange, TaskStore } from '../store/TaskStore'
import type { RetryPolicy } from '../lib/retryPolicy'
import type { DeliveryScheduler } from './deliveryScheduler'
import { WebhookDeliveryError, errorMessage } from '../lib/errors'
import { SIGNATURE_HEADER, signPayload } from '../lib/signature'
import { getLogger } from '../lib/logger'

const log = getLogger('webhook')

const USER_AGENT = 'media-task-orchestrator-webhook/1.0'

export interface WebhookNotifierOptions {
  deliveries: DeliveryRepository
  store: TaskStore
  scheduler: DeliveryScheduler
  retryPolicy: RetryPolicy
  requestTimeoutMs: number
  defaultSecret?: string
  /** task.progress fires only when progress crosses a multiple of this step. */
  progressEventStep: number
  fetchImpl?: typeof fetch
  now?: () => number
}

export class WebhookNotifier {
  private readonly fetchImpl: typeof fetch
  private readonly now: () => number
  /** Next sequence number per task, seeded from the repository on first use. */
  private readonly sequences = new Map<string, number>()
  /** Per-task chain serializing sequence assignment, inserts and head scheduling. */
  private readonly chains = new Map<string, Promise<unknown>>()
  /** The delivery per task this process last scheduled, so the same head is not scheduled twice. */
  private readonly heads = new Map<string, string>()
  private readonly progressBuckets = new Map<string, number>()
  private unsubscribe: (() => void) | null = null

  constructor(private readonly options: WebhookNotifierOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch
    this.now = options.now ?? Date.now
  }

  /** Subscribe to task changes and register the delivery handler. */
  start(): void {
    this.options.scheduler.start((deliveryId) => this.deliver(deliveryId))
    this.unsubscribe = this.options.store.onChange((change) => this.onTaskChange(change))
  }

  async stop(): Promise<void> {
    this.unsubscribe?.()
    this.unsubscribe = null
    await Promise.all(this.chains.values())
    await this.options.scheduler.close()
  }

  /** Re-schedule the head delivery of every task with open deliveries (after a restart). */
  async resume(): Promise<number> {
    const pending = await this.options.deliveries.listPending()
    let resumed = 0
    for (const delivery of pending) {
      if (this.heads.has(delivery.taskId)) continue
      this.heads.set(delivery.taskId, delivery.id)
      await this.options.scheduler.schedule(delivery.id, this.remainingDelay(delivery))
      resumed += 1
    }
    if (resumed > 0) log.info({ msg: 'Resumed webhook deliveries', count: resumed })
    return resumed
  }

  /**
   * Record an event for delivery. Returns the delivery, or null when the task has no webhook URL or a
   * progress event did not cross the next step.
   */
  notify(task: TaskRecord, eventType: TaskEventType): Promise<WebhookDelivery | null> {
    if (!task.webhookUrl) return Promise.resolve(null)
    if (eventType === 'task.progress' && !this.crossesProgressStep(task)) return Promise.resolve(null)
    if (isTerminalState(task.state)) this.progressBuckets.delete(task.id)
    return this.serialize(task.id, () => this.enqueue(task, eventType))
  }

  /** Number of tasks this notifier holds in-memory state for. */
  trackedTasks(): number {
    return new Set([...this.sequences.keys(), ...this.heads.keys(), ...this.progressBuckets.keys()]).size
  }

  /** One HTTP attempt for a delivery, then either done, rescheduled or permanently failed. */
  async deliver(deliveryId: string): Promise<void> {
    const delivery = await this.options.deliveries.get(deliveryId)
    if (!delivery) {
      log.warn({ msg: 'Delivery vanished before its attempt', deliveryId })
      return
    }
    if (delivery.delivered || delivery.failed) {
      await this.serialize(delivery.taskId, () => this.advance(delivery.taskId, delivery.id))
      return
    }

    const task = await this.options.store.get(delivery.taskId)
    const secret = task?.webhookSecret ?? this.options.defaultSecret
    const attemptAt = this.now()
    const updated: WebhookDelivery = { ...delivery, attemptCount: delivery.attemptCount + 1, lastAttemptAt: new Date(attemptAt) }

    let failure: WebhookDeliveryError | null = null
    try {
      const res = await this.fetchImpl(delivery.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': USER_AGENT,
          'X-Webhook-Event': delivery.eventType,
          'X-Webhook-Delivery': delivery.id,
          'X-Webhook-Timestamp': String(Math.floor(delivery.createdAt.getTime() / 1000)),
          ...(secret ? { [SIGNATURE_HEADER]: signPayload(delivery.body, secret) } : {}),
        },
        body: delivery.body,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      })
      updated.lastStatusCode = res.status
      if (!res.ok) failure = new WebhookDeliveryError(`Receiver returned ${res.status}`, res.status)
    } catch (err) {
      failure = new WebhookDeliveryError(errorMessage(err))
    }

    if (!failure) {
      updated.delivered = true
      updated.nextRetryAt = undefined
      updated.lastError = undefined
      await this.options.deliveries.update(updated)
      log.info({ msg: 'Webhook delivered', deliveryId, taskId: delivery.taskId, event: delivery.eventType, attempts: updated.attemptCount })
      await this.serialize(delivery.taskId, () => this.advance(delivery.taskId, delivery.id))
      return
    }

    updated.lastError = failure.message
    const decision = this.options.retryPolicy.decide(updated.attemptCount, failure, delivery.createdAt.getTime(), attemptAt)
    if (decision.retry) {
      updated.nextRetryAt = new Date(attemptAt + decision.delayMs)
      await this.options.deliveries.update(updated)
      log.warn({
        msg: 'Webhook attempt failed; retry scheduled',
        deliveryId,
        taskId: delivery.taskId,
        attempt: updated.attemptCount,
        delayMs: decision.delayMs,
        error: failure.message,
      })
      await this.options.scheduler.schedule(delivery.id, decision.delayMs)
      return
    }

    updated.failed = true
    updated.nextRetryAt = undefined
    await this.options.deliveries.update(updated)
    log.error({
      msg: 'Webhook delivery permanently failed',
      deliveryId,
      taskId: delivery.taskId,
      attempts: updated.attemptCount,
      error: failure.message,
    })
    await this.serialize(delivery.taskId, () => this.advance(delivery.taskId, delivery.id))
  }

  status(deliveryId: string): Promise<WebhookDelivery | undefined> {
    return this.options.deliveries.get(deliveryId)
  }

  listForTask(taskId: string): Promise<WebhookDelivery[]> {
    return this.options.deliveries.listForTask(taskId)
  }

  async summaryForTask(taskId: string): Promise<WebhookSummary> {
    return summarizeDeliveries(await this.options.deliveries.listForTask(taskId))
  }

  stats(): Promise<WebhookSummary> {
    return this.options.deliveries.counts()
  }

  private onTaskChange(change: TaskChange): void {
    this.notify(change.task, change.event).catch((err) =>
      log.error({ msg: 'Could not record webhook event', taskId: change.task.id, event: change.event, err })
    )
  }

  private async enqueue(task: TaskRecord, eventType: TaskEventType): Promise<WebhookDelivery> {
    const url = task.webhookUrl
    if (!url) throw new Error(`Task ${task.id} has no webhook URL`)
    const createdAt = new Date(this.now())
    const payload: WebhookPayload = {
      event_type: eventType,
      task_id: task.id,
      timestamp: createdAt.toISOString(),
      data: {
        status: task.state,
        progress: task.progress,
        ...(task.state === 'completed' ? { output: task.output } : {}),
        ...(task.state === 'failed' && task.lastError ? { error: task.lastError } : {}),
      },
    }
    const delivery: WebhookDelivery = {
      id: uuidv4(),
      taskId: task.id,
      eventType,
      url,
      body: JSON.stringify(payload),
      sequence: await this.nextSequence(task.id),
      attemptCount: 0,
      delivered: false,
      failed: false,
      createdAt,
    }
    await this.options.deliveries.insert(delivery)
    await this.scheduleHead(task.id)
    return delivery
  }

  /** After a delivery is done or failed, schedule whatever is now the task's oldest open delivery. */
  private async advance(taskId: string, finishedId: string): Promise<void> {
    if (this.heads.get(taskId) === finishedId) this.heads.delete(taskId)
    const head = await this.scheduleHead(taskId)
    if (!head) {
      this.heads.delete(taskId)
      this.sequences.delete(taskId)
    }
  }

  /** Schedule the oldest open delivery unless it is already scheduled here. Returns it, if any. */
  private async scheduleHead(taskId: string): Promise<WebhookDelivery | undefined> {
    const head = (await this.options.deliveries.listForTask(taskId)).find((d) => !d.delivered && !d.failed)
    if (!head || this.heads.get(taskId) === head.id) return head
    this.heads.set(taskId, head.id)
    await this.options.scheduler.schedule(head.id, this.remainingDelay(head))
    return head
  }

  private serialize<T>(taskId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(taskId) ?? Promise.resolve()
    const next = previous.then(work)
    const settled = next.catch(() => undefined)
    this.chains.set(taskId, settled)
    settled.finally(() => {
      if (this.chains.get(taskId) === settled) this.chains.delete(taskId)
    })
    return next
  }

  private async nextSequence(taskId: string): Promise<number> {
    let seq = this.sequences.get(taskId)
    if (seq === undefined) {
      const existing = await this.options.deliveries.listForTask(taskId)
      seq = existing.reduce((max, d) => Math.max(max, d.sequence), 0)
    }
    seq += 1
    this.sequences.set(taskId, seq)
    return seq
  }

  private crossesProgressStep(task: TaskRecord): boolean {
    const step = this.options.progressEventStep
    if (step <= 0) return true
    const bucket = Math.floor(task.progress / step + 1e-9)
    const last = this.progressBuckets.get(task.id) ?? 0
    if (bucket <= last) return false
    this.progressBuckets.set(task.id, bucket)
    return true
  }

  private remainingDelay(delivery: WebhookDelivery): number {
    return delivery.nextRetryAt ? Math.max(0, delivery.nextRetryAt.getTime() - this.now()) : 0
  }
}
