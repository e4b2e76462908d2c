/**
 * Postgres repositories over a pg Pool. Task writes are conditional on the version column
 * (UPDATE ... WHERE id = $1 AND version = $2), which gives the store its compare-and-swap.
 */
import fs from 'fs'
import path from 'path'
import type { Pool } from 'pg'
import type { TaskErrorCode, TaskEvent, TaskEventType, TaskRecord } from '../models/Task'
import { emptyStateCounts, emptyTypeCounts, isTaskPriority, isTaskState, isTaskType } from '../models/Task'
import type { BatchRecord } from '../models/Batch'
import type { WebhookDelivery, WebhookSummary } from '../models/WebhookDelivery'
import type {
  BatchRepository,
  DeliveryRepository,
  Repositories,
  TaskFilter,
  TaskRepository,
  TaskStats,
} from './repositories'

// Source tree (server/src/store) or compiled tree (dist/store) started from the repo root
const SCHEMA_CANDIDATES = [
  path.join(__dirname, '..', '..', 'sql', 'schema.sql'),
  path.join(process.cwd(), 'server', 'sql', 'schema.sql'),
]

interface TaskRow {
  id: string
  user_id: string | null
  type: string
  state: string
  priority: string
  input: unknown
  output: unknown
  metadata: unknown
  progress: number
  progress_seq: number
  attempt_count: number
  max_retries: number
  assigned_provider: string | null
  attempted_providers: unknown
  preferred_provider: string | null
  timeout_ms: number | null
  cost: number | null
  cancel_requested: boolean
  last_error: string | null
  error_code: string | null
  webhook_url: string | null
  webhook_secret: string | null
  batch_id: string | null
  created_at: Date
  updated_at: Date
  enqueued_at: Date
  not_before: Date | null
  started_at: Date | null
  completed_at: Date | null
  version: number
}

interface EventRow {
  task_id: string
  type: string
  state: string
  at: Date
  detail: unknown
}

interface BatchRow {
  id: string
  user_id: string | null
  task_ids: unknown
  created_at: Date
}

interface DeliveryRow {
  id: string
  task_id: string
  event_type: string
  url: string
  body: string
  sequence: number
  attempt_count: number
  delivered: boolean
  failed: boolean
  last_attempt_at: Date | null
  next_retry_at: Date | null
  last_error: string | null
  last_status_code: number | null
  created_at: Date
}

const TASK_ERROR_CODES: readonly TaskErrorCode[] = [
  'VALIDATION_FAILED',
  'PROVIDER_REJECTED',
  'PROVIDER_TIMEOUT',
  'PROVIDER_UNAVAILABLE',
  'RETRIES_EXHAUSTED',
  'INSUFFICIENT_CREDITS',
  'NO_PROVIDER_AVAILABLE',
  'CONTENT_REJECTED',
  'INTERNAL_ERROR',
]

const EVENT_TYPES: readonly TaskEventType[] = [
  'task.created',
  'task.dispatched',
  'task.started',
  'task.progress',
  'task.retrying',
  'task.completed',
  'task.failed',
  'task.cancelled',
]

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : []
}

function toErrorCode(value: string | null): TaskErrorCode | undefined {
  return TASK_ERROR_CODES.find((c) => c === value)
}

function toEventType(value: string): TaskEventType {
  const match = EVENT_TYPES.find((t) => t === value)
  if (!match) throw new Error(`Unknown task event type in database: ${value}`)
  return match
}

function rowToTask(row: TaskRow): TaskRecord {
  if (!isTaskType(row.type) || !isTaskState(row.state) || !isTaskPriority(row.priority)) {
    throw new Error(`Corrupt task row ${row.id}: ${row.type}/${row.state}/${row.priority}`)
  }
  return {
    id: row.id,
    userId: row.user_id ?? undefined,
    type: row.type,
    state: row.state,
    priority: row.priority,
    input: isRecord(row.input) ? row.input : {},
    output: row.output ?? undefined,
    metadata: isRecord(row.metadata) ? row.metadata : {},
    progress: row.progress,
    progressSeq: row.progress_seq,
    attemptCount: row.attempt_count,
    maxRetries: row.max_retries,
    assignedProvider: row.assigned_provider ?? undefined,
    attemptedProviders: toStringArray(row.attempted_providers),
    preferredProvider: row.preferred_provider ?? undefined,
    timeoutMs: row.timeout_ms ?? undefined,
    cost: row.cost ?? undefined,
    cancelRequested: row.cancel_requested,
    lastError: row.last_error ?? undefined,
    errorCode: toErrorCode(row.error_code),
    webhookUrl: row.webhook_url ?? undefined,
    webhookSecret: row.webhook_secret ?? undefined,
    batchId: row.batch_id ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    enqueuedAt: row.enqueued_at,
    notBefore: row.not_before ?? undefined,
    startedAt: row.started_at ?? undefined,
    completedAt: row.completed_at ?? undefined,
    version: row.version,
  }
}

/** Column order shared by INSERT and UPDATE. */
function taskParams(task: TaskRecord): unknown[] {
  return [
    task.id,
    task.userId ?? null,
    task.type,
    task.state,
    task.priority,
    JSON.stringify(task.input),
    task.output === undefined ? null : JSON.stringify(task.output),
    JSON.stringify(task.metadata),
    task.progress,
    task.progressSeq,
    task.attemptCount,
    task.maxRetries,
    task.assignedProvider ?? null,
    JSON.stringify(task.attemptedProviders),
    task.preferredProvider ?? null,
    task.timeoutMs ?? null,
    task.cost ?? null,
    task.cancelRequested,
    task.lastError ?? null,
    task.errorCode ?? null,
    task.webhookUrl ?? null,
    task.webhookSecret ?? null,
    task.batchId ?? null,
    task.createdAt,
    task.updatedAt,
    task.enqueuedAt,
    task.notBefore ?? null,
    task.startedAt ?? null,
    task.completedAt ?? null,
    task.version,
  ]
}

const TASK_COLUMNS = [
  'id', 'user_id', 'type', 'state', 'priority', 'input', 'output', 'metadata', 'progress', 'progress_seq',
  'attempt_count', 'max_retries', 'assigned_provider', 'attempted_providers', 'preferred_provider', 'timeout_ms',
  'cost', 'cancel_requested', 'last_error', 'error_code', 'webhook_url', 'webhook_secret', 'batch_id',
  'created_at', 'updated_at', 'enqueued_at', 'not_before', 'started_at', 'completed_at', 'version',
]

const INSERT_TASK_SQL = `INSERT INTO media_tasks (${TASK_COLUMNS.join(', ')}) VALUES (${TASK_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})`

// id is $1 and stays the key; every other column is overwritten. Expected version is the last parameter.
const UPDATE_TASK_SQL = `UPDATE media_tasks SET ${TASK_COLUMNS.slice(1)
  .map((c, i) => `${c} = $${i + 2}`)
  .join(', ')} WHERE id = $1 AND version = $${TASK_COLUMNS.length + 1}`

export class PgTaskRepository implements TaskRepository {
  constructor(private readonly pool: Pool) {}

  async insert(task: TaskRecord): Promise<void> {
    await this.pool.query(INSERT_TASK_SQL, taskParams(task))
  }

  async get(id: string): Promise<TaskRecord | undefined> {
    const res = await this.pool.query<TaskRow>('SELECT * FROM media_tasks WHERE id = $1', [id])
    const row = res.rows[0]
    return row ? rowToTask(row) : undefined
  }

  async getMany(ids: string[]): Promise<TaskRecord[]> {
    if (ids.length === 0) return []
    const res = await this.pool.query<TaskRow>('SELECT * FROM media_tasks WHERE id = ANY($1::text[])', [ids])
    return res.rows.map(rowToTask)
  }

  async compareAndSet(task: TaskRecord, expectedVersion: number): Promise<boolean> {
    const res = await this.pool.query(UPDATE_TASK_SQL, [...taskParams(task), expectedVersion])
    return res.rowCount === 1
  }

  async list(filter: TaskFilter): Promise<TaskRecord[]> {
    const where: string[] = []
    const params: unknown[] = []
    const add = (clause: string, value: unknown) => {
      params.push(value)
      where.push(clause.replace('?', `$${params.length}`))
    }
    if (filter.states && filter.states.length > 0) add('state = ANY(?::text[])', filter.states)
    if (filter.type) add('type = ?', filter.type)
    if (filter.priority) add('priority = ?', filter.priority)
    if (filter.provider) add('assigned_provider = ?', filter.provider)
    if (filter.batchId) add('batch_id = ?', filter.batchId)
    if (filter.userId) add('user_id = ?', filter.userId)

    let sql = 'SELECT * FROM media_tasks'
    if (where.length > 0) sql += ` WHERE ${where.join(' AND ')}`
    sql += ' ORDER BY created_at DESC'
    if (filter.limit !== undefined) {
      params.push(filter.limit)
      sql += ` LIMIT $${params.length}`
    }
    if (filter.offset) {
      params.push(filter.offset)
      sql += ` OFFSET $${params.length}`
    }
    const res = await this.pool.query<TaskRow>(sql, params)
    return res.rows.map(rowToTask)
  }

  async appendEvent(event: TaskEvent): Promise<void> {
    await this.pool.query(
      'INSERT INTO media_task_events (task_id, type, state, at, detail) VALUES ($1, $2, $3, $4, $5)',
      [event.taskId, event.type, event.state, event.at, event.detail ? JSON.stringify(event.detail) : null]
    )
  }

  async listEvents(taskId: string): Promise<TaskEvent[]> {
    const res = await this.pool.query<EventRow>(
      'SELECT task_id, type, state, at, detail FROM media_task_events WHERE task_id = $1 ORDER BY id ASC',
      [taskId]
    )
    return res.rows.map((row) => {
      if (!isTaskState(row.state)) throw new Error(`Corrupt event row for task ${row.task_id}`)
      return {
        taskId: row.task_id,
        type: toEventType(row.type),
        state: row.state,
        at: row.at,
        ...(isRecord(row.detail) ? { detail: row.detail } : {}),
      }
    })
  }

  async deleteTerminalBefore(cutoff: Date): Promise<number> {
    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      const res = await client.query<{ id: string }>(
        `DELETE FROM media_tasks WHERE state IN ('completed', 'failed', 'cancelled') AND updated_at < $1 RETURNING id`,
        [cutoff]
      )
      const ids = res.rows.map((r) => r.id)
      if (ids.length > 0) {
        await client.query('DELETE FROM media_task_events WHERE task_id = ANY($1::text[])', [ids])
      }
      await client.query('COMMIT')
      return ids.length
    } catch (err) {
      await client.query('ROLLBACK')
      throw err
    } finally {
      client.release()
    }
  }

  async stats(): Promise<TaskStats> {
    const grouped = await this.pool.query<{ type: string; state: string; n: string; cost: string | null }>(
      'SELECT type, state, COUNT(*) AS n, SUM(cost) AS cost FROM media_tasks GROUP BY type, state'
    )
    const duration = await this.pool.query<{ avg_ms: string | null }>(
      `SELECT AVG(EXTRACT(EPOCH FROM (completed_at - started_at)) * 1000) AS avg_ms
       FROM media_tasks WHERE state = 'completed' AND started_at IS NOT NULL AND completed_at IS NOT NULL`
    )
    const byState = emptyStateCounts()
    const byType = emptyTypeCounts()
    let totalCost = 0
    for (const row of grouped.rows) {
      const n = parseInt(row.n, 10)
      if (isTaskState(row.state)) byState[row.state] += n
      if (isTaskType(row.type)) byType[row.type] += n
      totalCost += row.cost ? parseFloat(row.cost) : 0
    }
    const avg = duration.rows[0]?.avg_ms
    return { byState, byType, totalCost, avgCompletedDurationMs: avg ? parseFloat(avg) : null }
  }
}

export class PgBatchRepository implements BatchRepository {
  constructor(private readonly pool: Pool) {}

  async insert(batch: BatchRecord): Promise<void> {
    await this.pool.query('INSERT INTO media_batches (id, user_id, task_ids, created_at) VALUES ($1, $2, $3, $4)', [
      batch.id,
      batch.userId ?? null,
      JSON.stringify(batch.taskIds),
      batch.createdAt,
    ])
  }

  async get(id: string): Promise<BatchRecord | undefined> {
    const res = await this.pool.query<BatchRow>('SELECT * FROM media_batches WHERE id = $1', [id])
    const row = res.rows[0]
    if (!row) return undefined
    return {
      id: row.id,
      userId: row.user_id ?? undefined,
      taskIds: toStringArray(row.task_ids),
      createdAt: row.created_at,
    }
  }
}

function rowToDelivery(row: DeliveryRow): WebhookDelivery {
  return {
    id: row.id,
    taskId: row.task_id,
    eventType: toEventType(row.event_type),
    url: row.url,
    body: row.body,
    sequence: row.sequence,
    attemptCount: row.attempt_count,
    delivered: row.delivered,
    failed: row.failed,
    lastAttemptAt: row.last_attempt_at ?? undefined,
    nextRetryAt: row.next_retry_at ?? undefined,
    lastError: row.last_error ?? undefined,
    lastStatusCode: row.last_status_code ?? undefined,
    createdAt: row.created_at,
  }
}

export class PgDeliveryRepository implements DeliveryRepository {
  constructor(private readonly pool: Pool) {}

  async insert(d: WebhookDelivery): Promise<void> {
    await this.pool.query(
      `INSERT INTO webhook_deliveries
        (id, task_id, event_type, url, body, sequence, attempt_count, delivered, failed,
         last_attempt_at, next_retry_at, last_error, last_status_code, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)`,
      [
        d.id, d.taskId, d.eventType, d.url, d.body, d.sequence, d.attemptCount, d.delivered, d.failed,
        d.lastAttemptAt ?? null, d.nextRetryAt ?? null, d.lastError ?? null, d.lastStatusCode ?? null, d.createdAt,
      ]
    )
  }

  async update(d: WebhookDelivery): Promise<void> {
    await this.pool.query(
      `UPDATE webhook_deliveries SET attempt_count = $2, delivered = $3, failed = $4, last_attempt_at = $5,
         next_retry_at = $6, last_error = $7, last_status_code = $8 WHERE id = $1`,
      [
        d.id, d.attemptCount, d.delivered, d.failed, d.lastAttemptAt ?? null, d.nextRetryAt ?? null,
        d.lastError ?? null, d.lastStatusCode ?? null,
      ]
    )
  }

  async get(id: string): Promise<WebhookDelivery | undefined> {
    const res = await this.pool.query<DeliveryRow>('SELECT * FROM webhook_deliveries WHERE id = $1', [id])
    const row = res.rows[0]
    return row ? rowToDelivery(row) : undefined
  }

  async listForTask(taskId: string): Promise<WebhookDelivery[]> {
    const res = await this.pool.query<DeliveryRow>(
      'SELECT * FROM webhook_deliveries WHERE task_id = $1 ORDER BY sequence ASC',
      [taskId]
    )
    return res.rows.map(rowToDelivery)
  }

  async listPending(): Promise<WebhookDelivery[]> {
    const res = await this.pool.query<DeliveryRow>(
      'SELECT * FROM webhook_deliveries WHERE delivered = FALSE AND failed = FALSE ORDER BY task_id, sequence'
    )
    return res.rows.map(rowToDelivery)
  }

  async counts(): Promise<WebhookSummary> {
    const res = await this.pool.query<{ delivered: string; failed: string; pending: string }>(
      `SELECT
         COUNT(*) FILTER (WHERE delivered) AS delivered,
         COUNT(*) FILTER (WHERE failed AND NOT delivered) AS failed,
         COUNT(*) FILTER (WHERE NOT delivered AND NOT failed) AS pending
       FROM webhook_deliveries`
    )
    const row = res.rows[0]
    return {
      delivered: parseInt(row?.delivered ?? '0', 10),
      failed: parseInt(row?.failed ?? '0', 10),
      pending: parseInt(row?.pending ?? '0', 10),
    }
  }
}

export async function applySchema(pool: Pool): Promise<void> {
  const schemaPath = SCHEMA_CANDIDATES.find((p) => fs.existsSync(p))
  if (!schemaPath) throw new Error(`schema.sql not found (looked in ${SCHEMA_CANDIDATES.join(', ')})`)
  const sql = fs.readFileSync(schemaPath, 'utf8')
  await pool.query(sql)
}

export function createPgRepositories(pool: Pool): Repositories {
  return {
    tasks: new PgTaskRepository(pool),
    batches: new PgBatchRepository(pool),
    deliveries: new PgDeliveryRepository(pool),
    ping: async () => {
      await pool.query('SELECT 1')
    },
    close: () => pool.end(),
  }
}
