import type { TaskEvent, TaskPriority, TaskRecord, TaskState, TaskType } from '../models/Task'
import type { BatchRecord } from '../models/Batch'
import type { WebhookDelivery, WebhookSummary } from '../models/WebhookDelivery'

/** Aggregates over every stored task; durations are startedAt to completedAt of completed tasks. */
export interface TaskStats {
  byState: Record<TaskState, number>
  byType: Record<TaskType, number>
  totalCost: number
  avgCompletedDurationMs: number | null
}

export interface TaskFilter {
  states?: TaskState[]
  type?: TaskType
  priority?: TaskPriority
  provider?: string
  batchId?: string
  userId?: string
  limit?: number
  offset?: number
}

/**
 * Durable task rows. `compareAndSet` writes only if the stored version still equals `expectedVersion`,
 * which is how concurrent writers to one task id are serialized.
 */
export interface TaskRepository {
  insert(task: TaskRecord): Promise<void>
  get(id: string): Promise<TaskRecord | undefined>
  getMany(ids: string[]): Promise<TaskRecord[]>
  compareAndSet(task: TaskRecord, expectedVersion: number): Promise<boolean>
  /** Newest first. */
  list(filter: TaskFilter): Promise<TaskRecord[]>
  appendEvent(event: TaskEvent): Promise<void>
  listEvents(taskId: string): Promise<TaskEvent[]>
  /** Delete terminal tasks (and their events) last updated before the cutoff. Returns the count removed. */
  deleteTerminalBefore(cutoff: Date): Promise<number>
  stats(): Promise<TaskStats>
}

export interface BatchRepository {
  insert(batch: BatchRecord): Promise<void>
  get(id: string): Promise<BatchRecord | undefined>
}

export interface DeliveryRepository {
  insert(delivery: WebhookDelivery): Promise<void>
  update(delivery: WebhookDelivery): Promise<void>
  get(id: string): Promise<WebhookDelivery | undefined>
  listForTask(taskId: string): Promise<WebhookDelivery[]>
  /** Not yet delivered and not permanently failed, ordered by task then sequence. */
  listPending(): Promise<WebhookDelivery[]>
  counts(): Promise<WebhookSummary>
}

export interface Repositories {
  tasks: TaskRepository
  batches: BatchRepository
  deliveries: DeliveryRepository
  /** Present when backed by a database; used by /readyz. */
  ping?: () => Promise<void>
  close?: () => Promise<void>
}
