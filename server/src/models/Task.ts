export const TASK_TYPES = [
  'image_generation',
  'video_generation',
  'audio_transcription',
  'subtitle_generation',
] as const

export type TaskType = (typeof TASK_TYPES)[number]

export const TASK_STATES = [
  'queued',
  'dispatched',
  'processing',
  'completed',
  'failed',
  'cancelled',
] as const

export type TaskState = (typeof TASK_STATES)[number]

export const TASK_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const

export type TaskPriority = (typeof TASK_PRIORITIES)[number]

/** Numeric band for ordering; higher runs first. */
export const PRIORITY_RANK: Record<TaskPriority, number> = {
  low: 0,
  medium: 1,
  high: 2,
  urgent: 3,
}

export const MAX_PRIORITY_RANK = PRIORITY_RANK.urgent

export type TaskErrorCode =
  | 'VALIDATION_FAILED'
  | 'PROVIDER_REJECTED'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_UNAVAILABLE'
  | 'RETRIES_EXHAUSTED'
  | 'INSUFFICIENT_CREDITS'
  | 'NO_PROVIDER_AVAILABLE'
  | 'CONTENT_REJECTED'
  | 'INTERNAL_ERROR'

export interface TaskRecord {
  id: string
  userId?: string

  type: TaskType
  state: TaskState
  priority: TaskPriority

  input: Record<string, unknown>
  output?: unknown
  metadata: Record<string, unknown>

  // Progress in [0, 1]; progressSeq is the last applied channel sequence number
  progress: number
  progressSeq: number

  // Execution
  attemptCount: number
  maxRetries: number
  assignedProvider?: string
  attemptedProviders: string[]
  preferredProvider?: string
  timeoutMs?: number
  cost?: number
  cancelRequested: boolean

  // Error tracking
  lastError?: string
  errorCode?: TaskErrorCode

  // Webhook
  webhookUrl?: string
  webhookSecret?: string

  batchId?: string

  // Timestamps
  createdAt: Date
  updatedAt: Date
  enqueuedAt: Date
  notBefore?: Date
  startedAt?: Date
  completedAt?: Date

  version: number
}

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['completed', 'failed', 'cancelled'])

/** Edges every execution path must follow. Terminal states have none. */
const ALLOWED_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  queued: ['dispatched', 'cancelled', 'failed'],
  dispatched: ['processing', 'queued', 'cancelled', 'failed'],
  processing: ['completed', 'failed', 'queued', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
}

export function emptyStateCounts(): Record<TaskState, number> {
  return { queued: 0, dispatched: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 }
}

export function emptyTypeCounts(): Record<TaskType, number> {
  return { image_generation: 0, video_generation: 0, audio_transcription: 0, subtitle_generation: 0 }
}

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.has(state)
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to)
}

export function isTaskType(value: unknown): value is TaskType {
  return typeof value === 'string' && (TASK_TYPES as readonly string[]).includes(value)
}

export function isTaskState(value: unknown): value is TaskState {
  return typeof value === 'string' && (TASK_STATES as readonly string[]).includes(value)
}

export function isTaskPriority(value: unknown): value is TaskPriority {
  return typeof value === 'string' && (TASK_PRIORITIES as readonly string[]).includes(value)
}

/** Lifecycle events fanned out to webhooks and the task event log. */
export type TaskEventType =
  | 'task.created'
  | 'task.dispatched'
  | 'task.started'
  | 'task.progress'
  | 'task.retrying'
  | 'task.completed'
  | 'task.failed'
  | 'task.cancelled'

export function eventTypeForState(state: TaskState, previous?: TaskState): TaskEventType {
  switch (state) {
    case 'queued':
      return previous ? 'task.retrying' : 'task.created'
    case 'dispatched':
      return 'task.dispatched'
    case 'processing':
      return 'task.started'
    case 'completed':
      return 'task.completed'
    case 'failed':
      return 'task.failed'
    case 'cancelled':
      return 'task.cancelled'
  }
}

export interface TaskEvent {
  taskId: string
  type: TaskEventType
  state: TaskState
  at: Date
  detail?: Record<string, unknown>
}
