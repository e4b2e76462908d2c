/**
 * In-process repositories. Used when DATABASE_URL is not set (local dev) and by the tests.
 * Records are cloned on the way in and out so callers never share mutable state with the store.
 */
import type { TaskEvent, TaskRecord } from '../models/Task'
import { emptyStateCounts, emptyTypeCounts, isTerminalState } from '../models/Task'
import type { BatchRecord } from '../models/Batch'
import type { WebhookDelivery, WebhookSummary } from '../models/WebhookDelivery'
import { summarizeDeliveries } from '../models/WebhookDelivery'
import type {
  BatchRepository,
  DeliveryRepository,
  Repositories,
  TaskFilter,
  TaskRepository,
  TaskStats,
} from './repositories'

function cloneTask(task: TaskRecord): TaskRecord {
  return {
    ...task,
    input: { ...task.input },
    metadata: { ...task.metadata },
    attemptedProviders: [...task.attemptedProviders],
  }
}

export function matchesFilter(task: TaskRecord, filter: TaskFilter): boolean {
  if (filter.states && filter.states.length > 0 && !filter.states.includes(task.state)) return false
  if (filter.type && task.type !== filter.type) return false
  if (filter.priority && task.priority !== filter.priority) return false
  if (filter.provider && task.assignedProvider !== filter.provider) return false
  if (filter.batchId && task.batchId !== filter.batchId) return false
  if (filter.userId && task.userId !== filter.userId) return false
  return true
}

export class MemoryTaskRepository implements TaskRepository {
  private readonly tasks = new Map<string, TaskRecord>()
  private readonly events = new Map<string, TaskEvent[]>()

  async insert(task: TaskRecord): Promise<void> {
    if (this.tasks.has(task.id)) throw new Error(`Task ${task.id} already exists`)
    this.tasks.set(task.id, cloneTask(task))
  }

  async get(id: string): Promise<TaskRecord | undefined> {
    const task = this.tasks.get(id)
    return task ? cloneTask(task) : undefined
  }

  async getMany(ids: string[]): Promise<TaskRecord[]> {
    const out: TaskRecord[] = []
    for (const id of ids) {
      const task = this.tasks.get(id)
      if (task) out.push(cloneTask(task))
    }
    return out
  }

  async compareAndSet(task: TaskRecord, expectedVersion: number): Promise<boolean> {
    const current = this.tasks.get(task.id)
    if (!current || current.version !== expectedVersion) return false
    this.tasks.set(task.id, cloneTask(task))
    return true
  }

  async list(filter: TaskFilter): Promise<TaskRecord[]> {
    const matched = [...this.tasks.values()]
      .filter((t) => matchesFilter(t, filter))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
    const offset = filter.offset ?? 0
    const sliced = filter.limit !== undefined ? matched.slice(offset, offset + filter.limit) : matched.slice(offset)
    return sliced.map(cloneTask)
  }

  async appendEvent(event: TaskEvent): Promise<void> {
    const list = this.events.get(event.taskId) ?? []
    list.push({ ...event })
    this.events.set(event.taskId, list)
  }

  async listEvents(taskId: string): Promise<TaskEvent[]> {
    return (this.events.get(taskId) ?? []).map((e) => ({ ...e }))
  }

  async deleteTerminalBefore(cutoff: Date): Promise<number> {
    let removed = 0
    for (const [id, task] of this.tasks) {
      if (isTerminalState(task.state) && task.updatedAt.getTime() < cutoff.getTime()) {
        this.tasks.delete(id)
        this.events.delete(id)
        removed += 1
      }
    }
    return removed
  }

  async stats(): Promise<TaskStats> {
    const byState = emptyStateCounts()
    const byType = emptyTypeCounts()
    let totalCost = 0
    let durationSum = 0
    let durationCount = 0
    for (const task of this.tasks.values()) {
      byState[task.state] += 1
      byType[task.type] += 1
      totalCost += task.cost ?? 0
      if (task.state === 'completed' && task.startedAt && task.completedAt) {
        durationSum += task.completedAt.getTime() - task.startedAt.getTime()
        durationCount += 1
      }
    }
    return { byState, byType, totalCost, avgCompletedDurationMs: durationCount > 0 ? durationSum / durationCount : null }
  }
}

export class MemoryBatchRepository implements BatchRepository {
  private readonly batches = new Map<string, BatchRecord>()

  async insert(batch: BatchRecord): Promise<void> {
    this.batches.set(batch.id, { ...batch, taskIds: [...batch.taskIds] })
  }

  async get(id: string): Promise<BatchRecord | undefined> {
    const batch = this.batches.get(id)
    return batch ? { ...batch, taskIds: [...batch.taskIds] } : undefined
  }
}

export class MemoryDeliveryRepository implements DeliveryRepository {
  private readonly deliveries = new Map<string, WebhookDelivery>()

  async insert(delivery: WebhookDelivery): Promise<void> {
    this.deliveries.set(delivery.id, { ...delivery })
  }

  async update(delivery: WebhookDelivery): Promise<void> {
    this.deliveries.set(delivery.id, { ...delivery })
  }

  async get(id: string): Promise<WebhookDelivery | undefined> {
    const d = this.deliveries.get(id)
    return d ? { ...d } : undefined
  }

  async listForTask(taskId: string): Promise<WebhookDelivery[]> {
    return [...this.deliveries.values()]
      .filter((d) => d.taskId === taskId)
      .sort((a, b) => a.sequence - b.sequence)
      .map((d) => ({ ...d }))
  }

  async listPending(): Promise<WebhookDelivery[]> {
    return [...this.deliveries.values()]
      .filter((d) => !d.delivered && !d.failed)
      .sort((a, b) => (a.taskId === b.taskId ? a.sequence - b.sequence : a.taskId.localeCompare(b.taskId)))
      .map((d) => ({ ...d }))
  }

  async counts(): Promise<WebhookSummary> {
    return summarizeDeliveries([...this.deliveries.values()])
  }
}

export function createMemoryRepositories(): Repositories {
  return {
    tasks: new MemoryTaskRepository(),
    batches: new MemoryBatchRepository(),
    deliveries: new MemoryDeliveryRepository(),
  }
}
