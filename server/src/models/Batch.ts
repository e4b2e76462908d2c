import type { TaskRecord, TaskState } from './Task'
import { emptyStateCounts, isTerminalState } from './Task'

export interface BatchRecord {
  id: string
  userId?: string
  taskIds: string[]
  createdAt: Date
}

export type BatchStatus = 'queued' | 'processing' | 'completed'

export interface BatchView {
  batchId: string
  status: BatchStatus
  total: number
  counts: Record<TaskState, number>
  tasks: {
    taskId: string
    status: TaskState
    progress: number
    error?: string
  }[]
  createdAt: Date
}

/** Batch status is derived from the children only; there is no stored batch state. */
export function deriveBatchView(batch: BatchRecord, children: TaskRecord[]): BatchView {
  const byId = new Map(children.map((t) => [t.id, t]))
  const ordered = batch.taskIds
    .map((id) => byId.get(id))
    .filter((t): t is TaskRecord => t !== undefined)
  const counts = emptyStateCounts()
  for (const task of ordered) counts[task.state] += 1

  // Only terminal children are ever pruned, so a batch with none left is finished
  let status: BatchStatus = 'processing'
  if (ordered.every((t) => isTerminalState(t.state))) status = 'completed'
  else if (ordered.every((t) => t.state === 'queued')) status = 'queued'

  return {
    batchId: batch.id,
    status,
    total: batch.taskIds.length,
    counts,
    tasks: ordered.map((t) => ({
      taskId: t.id,
      status: t.state,
      progress: t.progress,
      ...(t.lastError && t.state === 'failed' ? { error: t.lastError } : {}),
    })),
    createdAt: batch.createdAt,
  }
}
