/**
 * Client-facing task operations. Validates requests, persists through the store and hands work to the
 * scheduler; everything the HTTP layer exposes for single tasks goes through here.
 */
import { v4 as uuidv4 } from 'uuid'
import type { TaskErrorCode, TaskEvent, TaskRecord, TaskState, TaskType } from '../models/Task'
import type { CreateTaskRequest } from '../models/schemas'
import { createTaskRequest, describeIssues, listTasksQuery } from '../models/schemas'
import type { WebhookDelivery, WebhookSummary } from '../models/WebhookDelivery'
import type { TaskStore } from '../store/TaskStore'
import type { Scheduler } from '../workers/scheduler'
import type { WebhookNotifier } from '../workers/webhookNotifier'
import { InvalidStateError, TaskNotFoundError, TooLateError, ValidationError } from '../lib/errors'
import { withTaskContext } from '../lib/logger'

export interface TaskServiceOptions {
  store: TaskStore
  scheduler: Scheduler
  notifier: WebhookNotifier
  defaultMaxRetries: number
  retryResetsAttempts: boolean
  now?: () => number
}

/** Who is asking; reads and writes are limited to the caller's own tasks when set. */
export interface Caller {
  userId?: string
}

export interface CreateOptions extends Caller {
  batchId?: string
  taskId?: string
}

export interface TaskStatusView {
  taskId: string
  type: TaskType
  status: TaskState
  priority: string
  progress: number
  output?: unknown
  error?: string
  errorCode?: TaskErrorCode
  attemptCount: number
  maxRetries: number
  provider?: string
  cost?: number
  batchId?: string
  queuePosition?: number
  cancelRequested?: boolean
  webhook?: WebhookSummary
  metadata: Record<string, unknown>
  createdAt: string
  updatedAt: string
  startedAt?: string
  completedAt?: string
}

export interface TaskStatistics {
  total: number
  byState: Record<TaskState, number>
  byType: Record<TaskType, number>
  /** completed / (completed + failed); null before anything finished. */
  successRate: number | null
  totalCost: number
  avgCompletedDurationMs: number | null
  queueDepth: number
  running: number
}

export class TaskService {
  private readonly now: () => number

  constructor(private readonly options: TaskServiceOptions) {
    this.now = options.now ?? Date.now
  }

  /** Validate a raw request body; throws ValidationError with per-field issues. */
  parseRequest(raw: unknown): CreateTaskRequest {
    const parsed = createTaskRequest.safeParse(raw)
    if (!parsed.success) {
      throw new ValidationError('Invalid task request', { issues: describeIssues(parsed.error) })
    }
    return parsed.data
  }

  async createTask(raw: unknown, options: CreateOptions = {}): Promise<{ taskId: string; status: 'queued' }> {
    return this.createValidated(this.parseRequest(raw), options)
  }

  /** Persist and enqueue a request that already passed parseRequest. */
  async createValidated(request: CreateTaskRequest, options: CreateOptions = {}): Promise<{ taskId: string; status: 'queued' }> {
    const now = new Date(this.now())
    const task: TaskRecord = {
      id: options.taskId ?? uuidv4(),
      userId: options.userId,
      type: request.type,
      state: 'queued',
      priority: request.priority,
      input: { ...request.input },
      metadata: request.metadata,
      progress: 0,
      progressSeq: 0,
      attemptCount: 0,
      maxRetries: request.maxRetries ?? this.options.defaultMaxRetries,
      attemptedProviders: [],
      preferredProvider: request.preferredProvider,
      timeoutMs: request.timeoutMs,
      cancelRequested: false,
      webhookUrl: request.webhookUrl,
      webhookSecret: request.webhookSecret,
      batchId: options.batchId,
      createdAt: now,
      updatedAt: now,
      enqueuedAt: now,
      version: 0,
    }
    await this.options.store.create(task)
    this.options.scheduler.enqueue(task)
    withTaskContext(task.id).info({ msg: 'Task created', type: task.type, priority: task.priority, batchId: task.batchId })
    return { taskId: task.id, status: 'queued' }
  }

  async getStatus(taskId: string, caller: Caller = {}): Promise<TaskStatusView> {
    const task = await this.load(taskId, caller)
    const webhook = task.webhookUrl ? await this.options.notifier.summaryForTask(task.id) : undefined
    return {
      ...toView(task),
      ...(task.state === 'queued' ? { queuePosition: this.options.scheduler.position(task.id) } : {}),
      ...(webhook ? { webhook } : {}),
    }
  }

  /**
   * Queued tasks are cancelled at once; dispatched or processing ones get the cooperative flag and
   * report `cancelling` until the dispatcher reaches a checkpoint.
   */
  async cancel(taskId: string, caller: Caller = {}): Promise<{ taskId: string; status: 'cancelled' | 'cancelling' }> {
    const { store, scheduler } = this.options
    let task = await this.load(taskId, caller)

    // A queued task can be picked up between the read and the write; re-read and decide again
    for (let round = 0; round < 3; round++) {
      if (task.state === 'cancelled') return { taskId, status: 'cancelled' }
      if (task.state === 'completed' || task.state === 'failed') throw new TooLateError(taskId, task.state)

      if (task.state === 'queued') {
        const result = await store.transition(
          taskId,
          'cancelled',
          { completedAt: new Date(this.now()), cancelRequested: true },
          { from: ['queued'], detail: { requestedBy: 'client' } }
        )
        if (result.ok) {
          scheduler.remove(taskId)
          withTaskContext(taskId).info({ msg: 'Queued task cancelled' })
          return { taskId, status: 'cancelled' }
        }
      } else {
        const result = await store.patch(taskId, (current) => (current.cancelRequested ? null : { cancelRequested: true }))
        if (result.ok || result.reason === 'noop') {
          withTaskContext(taskId).info({ msg: 'Cancellation requested for in-flight task', state: task.state })
          return { taskId, status: 'cancelling' }
        }
      }

      const latest = await store.get(taskId)
      if (!latest) throw new TaskNotFoundError(taskId)
      task = latest
    }
    throw new InvalidStateError(taskId, task.state, 'cancel')
  }

  /** Re-run a failed task under the same id. */
  async retry(taskId: string, caller: Caller = {}): Promise<{ taskId: string; status: 'queued'; attemptCount: number }> {
    const task = await this.load(taskId, caller)
    if (task.state !== 'failed') throw new InvalidStateError(taskId, task.state, 'retry')
    const result = await this.options.store.requeueFailed(taskId, this.options.retryResetsAttempts)
    if (!result.ok) throw new InvalidStateError(taskId, result.task?.state ?? task.state, 'retry')
    this.options.scheduler.enqueue(result.task)
    withTaskContext(taskId).info({ msg: 'Failed task re-queued', attemptCount: result.task.attemptCount })
    return { taskId, status: 'queued', attemptCount: result.task.attemptCount }
  }

  async listTasks(rawQuery: unknown, caller: Caller = {}): Promise<{ tasks: TaskStatusView[]; limit: number; offset: number }> {
    const parsed = listTasksQuery.safeParse(rawQuery)
    if (!parsed.success) {
      throw new ValidationError('Invalid task filter', { issues: describeIssues(parsed.error) })
    }
    const query = parsed.data
    const tasks = await this.options.store.list({
      states: query.status,
      type: query.type,
      priority: query.priority,
      provider: query.provider,
      batchId: query.batchId,
      userId: caller.userId,
      limit: query.limit,
      offset: query.offset,
    })
    return { tasks: tasks.map(toView), limit: query.limit, offset: query.offset }
  }

  async statistics(): Promise<TaskStatistics> {
    const stats = await this.options.store.stats()
    const finished = stats.byState.completed + stats.byState.failed
    const total = Object.values(stats.byState).reduce((sum, n) => sum + n, 0)
    return {
      total,
      byState: stats.byState,
      byType: stats.byType,
      successRate: finished > 0 ? stats.byState.completed / finished : null,
      totalCost: stats.totalCost,
      avgCompletedDurationMs: stats.avgCompletedDurationMs,
      queueDepth: this.options.scheduler.size(),
      running: this.options.scheduler.running(),
    }
  }

  async events(taskId: string, caller: Caller = {}): Promise<TaskEvent[]> {
    await this.load(taskId, caller)
    return this.options.store.events(taskId)
  }

  async webhookDeliveries(taskId: string, caller: Caller = {}): Promise<WebhookDelivery[]> {
    await this.load(taskId, caller)
    return this.options.notifier.listForTask(taskId)
  }

  /** Delete terminal tasks whose last update is older than `olderThanMs`. */
  pruneExpired(olderThanMs: number): Promise<number> {
    return this.options.store.pruneTerminal(new Date(this.now() - olderThanMs))
  }

  private async load(taskId: string, caller: Caller): Promise<TaskRecord> {
    const task = await this.options.store.get(taskId)
    // Another caller's task is reported as missing rather than forbidden
    if (!task || (caller.userId && task.userId && task.userId !== caller.userId)) {
      throw new TaskNotFoundError(taskId)
    }
    return task
  }
}

function toView(task: TaskRecord): TaskStatusView {
  return {
    taskId: task.id,
    type: task.type,
    status: task.state,
    priority: task.priority,
    progress: task.progress,
    ...(task.state === 'completed' ? { output: task.output } : {}),
    ...(task.state === 'failed' && task.lastError ? { error: task.lastError } : {}),
    ...(task.errorCode ? { errorCode: task.errorCode } : {}),
    attemptCount: task.attemptCount,
    maxRetries: task.maxRetries,
    ...(task.assignedProvider ? { provider: task.assignedProvider } : {}),
    ...(task.cost !== undefined ? { cost: task.cost } : {}),
    ...(task.batchId ? { batchId: task.batchId } : {}),
    ...(task.cancelRequested && task.state !== 'cancelled' ? { cancelRequested: true } : {}),
    metadata: task.metadata,
    createdAt: task.createdAt.toISOString(),
    updatedAt: task.updatedAt.toISOString(),
    ...(task.startedAt ? { startedAt: task.startedAt.toISOString() } : {}),
    ...(task.completedAt ? { completedAt: task.completedAt.toISOString() } : {}),
  }
}
