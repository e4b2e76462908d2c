import { v4 as uuidv4 } from 'uuid'
import type { BatchView } from '../models/Batch'
import { deriveBatchView } from '../models/Batch'
import type { CreateTaskRequest } from '../models/schemas'
import { batchRequest, describeIssues } from '../models/schemas'
import type { BatchRepository } from '../store/repositories'
import type { TaskStore } from '../store/TaskStore'
import type { Caller, TaskService } from './taskService'
import { BatchNotFoundError, BatchTooLargeError, OrchestratorError, ValidationError } from '../lib/errors'
import { getLogger } from '../lib/logger'

const log = getLogger('api')

export interface BatchCoordinatorOptions {
  batches: BatchRepository
  store: TaskStore
  tasks: TaskService
  maxBatchSize: number
  now?: () => number
}

/**
 * Groups independent tasks under one id. A batch is accepted whole or not at all: size and every
 * request are checked before the first task exists. Children run and fail independently.
 */
export class BatchCoordinator {
  private readonly now: () => number

  constructor(private readonly options: BatchCoordinatorOptions) {
    this.now = options.now ?? Date.now
  }

  async submitBatch(raw: unknown, caller: Caller = {}): Promise<{ batchId: string; taskIds: string[] }> {
    const envelope = batchRequest.safeParse(raw)
    if (!envelope.success) {
      throw new ValidationError('Invalid batch request', { issues: describeIssues(envelope.error) })
    }
    const { requests } = envelope.data
    if (requests.length > this.options.maxBatchSize) {
      throw new BatchTooLargeError(requests.length, this.options.maxBatchSize)
    }

    const valid: CreateTaskRequest[] = []
    const errors: { index: number; issues: unknown }[] = []
    requests.forEach((request, index) => {
      try {
        valid.push(this.options.tasks.parseRequest(request))
      } catch (err) {
        if (!(err instanceof OrchestratorError)) throw err
        errors.push({ index, issues: err.details?.issues })
      }
    })
    if (errors.length > 0) {
      throw new ValidationError(`${errors.length} of ${requests.length} batch requests are invalid`, { errors })
    }

    const batchId = uuidv4()
    const taskIds = valid.map(() => uuidv4())
    await this.options.batches.insert({ id: batchId, userId: caller.userId, taskIds, createdAt: new Date(this.now()) })
    for (const [i, request] of valid.entries()) {
      await this.options.tasks.createValidated(request, { ...caller, batchId, taskId: taskIds[i] })
    }
    log.info({ msg: 'Batch submitted', batchId, size: taskIds.length })
    return { batchId, taskIds }
  }

  async getBatch(batchId: string, caller: Caller = {}): Promise<BatchView> {
    const batch = await this.options.batches.get(batchId)
    if (!batch || (caller.userId && batch.userId && batch.userId !== caller.userId)) {
      throw new BatchNotFoundError(batchId)
    }
    const children = await this.options.store.getMany(batch.taskIds)
    return deriveBatchView(batch, children)
  }
}
