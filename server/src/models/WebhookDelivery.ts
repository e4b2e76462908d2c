import type { TaskEventType } from './Task'

export interface WebhookDelivery {
  id: string
  taskId: string
  eventType: TaskEventType
  url: string
  /** Serialized once at creation; every attempt sends the same bytes. */
  body: string
  /** Position in the task's event stream; deliveries go out in this order per task. */
  sequence: number

  attemptCount: number
  delivered: boolean
  /** Retries exhausted; never attempted again. */
  failed: boolean
  lastAttemptAt?: Date
  nextRetryAt?: Date
  lastError?: string
  lastStatusCode?: number

  createdAt: Date
}

export interface WebhookPayload {
  event_type: TaskEventType
  task_id: string
  timestamp: string
  data: {
    status: string
    progress: number
    output?: unknown
    error?: string
  }
}

export interface WebhookSummary {
  pending: number
  delivered: number
  failed: number
}

export function summarizeDeliveries(deliveries: WebhookDelivery[]): WebhookSummary {
  let pending = 0
  let delivered = 0
  let failed = 0
  for (const d of deliveries) {
    if (d.delivered) delivered += 1
    else if (d.failed) failed += 1
    else pending += 1
  }
  return { pending, delivered, failed }
}
