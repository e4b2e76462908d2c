import { describe, it, expect, afterEach } from 'vitest'
import { createOrchestrator, type Orchestrator } from '../services/orchestrator'
import { createMemoryRepositories } from '../store/memory'
import { PermanentProviderError } from '../lib/errors'
import { FakeProvider, ManualClock, ManualDeliveryScheduler, testConfig, waitFor } from './helpers'

const imageRequest = (overrides: Record<string, unknown> = {}) => ({
  type: 'image_generation',
  input: { prompt: 'a lighthouse at dusk' },
  ...overrides,
})

describe('TaskService', () => {
  let orchestrator: Orchestrator

  function build(providers: FakeProvider[] = [], now?: () => number): Orchestrator {
    orchestrator = createOrchestrator(testConfig(), {
      repositories: createMemoryRepositories(),
      providers: providers.map((provider) => ({ provider, options: {} })),
      deliveryScheduler: new ManualDeliveryScheduler(),
      now,
    })
    return orchestrator
  }

  async function statusOf(taskId: string) {
    return (await orchestrator.tasks.getStatus(taskId)).status
  }

  afterEach(async () => {
    await orchestrator.stop()
  })

  describe('createTask', () => {
    it('should reject an invalid request with per-field issues', async () => {
      const { tasks } = build()

      await expect(tasks.createTask(imageRequest({ input: { prompt: '   ' } }))).rejects.toMatchObject({
        code: 'VALIDATION_FAILED',
        status: 400,
        details: { issues: [expect.stringMatching(/^input\.prompt: /)] },
      })
      expect((await tasks.listTasks({})).tasks).toEqual([])
    })

    it('should apply defaults and report the queue position', async () => {
      const { tasks } = build()
      const first = await tasks.createTask(imageRequest())
      const second = await tasks.createTask(imageRequest({ priority: 'low', maxRetries: 0 }))

      expect(first.status).toBe('queued')
      const view = await tasks.getStatus(second.taskId)
      expect(view).toMatchObject({
        status: 'queued',
        priority: 'low',
        maxRetries: 0,
        attemptCount: 0,
        progress: 0,
        queuePosition: 2,
      })
      expect(view.webhook).toBeUndefined()
      expect((await tasks.getStatus(first.taskId)).maxRetries).toBe(3)
    })
  })

  describe('cancel', () => {
    it('should cancel a queued task at once and stay cancelled', async () => {
      const { tasks, scheduler } = build()
      const { taskId } = await tasks.createTask(imageRequest())

      expect(await tasks.cancel(taskId)).toEqual({ taskId, status: 'cancelled' })
      expect(scheduler.has(taskId)).toBe(false)
      expect(await tasks.cancel(taskId)).toEqual({ taskId, status: 'cancelled' })
      expect((await tasks.events(taskId)).map((e) => e.type)).toEqual(['task.created', 'task.cancelled'])
    })

    it('should flag an in-flight task and cancel it at the next checkpoint', async () => {
      const provider = new FakeProvider('slow', ['image_generation'], [{ kind: 'hold' }])
      const { tasks } = build([provider])
      await orchestrator.start()
      const { taskId } = await tasks.createTask(imageRequest())
      await waitFor(() => provider.heldCount() === 1)

      expect(await tasks.cancel(taskId)).toEqual({ taskId, status: 'cancelling' })
      expect(await tasks.getStatus(taskId)).toMatchObject({ status: 'processing', cancelRequested: true })

      provider.release()
      await waitFor(async () => (await statusOf(taskId)) === 'cancelled')
      expect((await tasks.getStatus(taskId)).output).toBeUndefined()
    })

    it('should refuse to cancel a completed task', async () => {
      const { tasks } = build([new FakeProvider('fast')])
      await orchestrator.start()
      const { taskId } = await tasks.createTask(imageRequest())
      await waitFor(async () => (await statusOf(taskId)) === 'completed')

      await expect(tasks.cancel(taskId)).rejects.toMatchObject({ code: 'TOO_LATE', status: 409 })
    })
  })

  describe('retry', () => {
    it('should re-run a failed task with a fresh attempt budget', async () => {
      const provider = new FakeProvider('picky', ['image_generation'], [
        { kind: 'error', error: new PermanentProviderError('prompt rejected') },
        { kind: 'ok', output: { url: 'asset-2' } },
      ])
      const { tasks } = build([provider])
      await orchestrator.start()
      const { taskId } = await tasks.createTask(imageRequest())
      await waitFor(async () => (await statusOf(taskId)) === 'failed')

      const failed = await tasks.getStatus(taskId)
      expect(failed).toMatchObject({ attemptCount: 1, errorCode: 'PROVIDER_REJECTED', error: 'prompt rejected' })

      expect(await tasks.retry(taskId)).toEqual({ taskId, status: 'queued', attemptCount: 0 })
      await waitFor(async () => (await statusOf(taskId)) === 'completed')
      expect(await tasks.getStatus(taskId)).toMatchObject({ attemptCount: 1, output: { url: 'asset-2' } })
    })

    it('should only retry failed tasks', async () => {
      const { tasks } = build()
      const { taskId } = await tasks.createTask(imageRequest())

      await expect(tasks.retry(taskId)).rejects.toMatchObject({ code: 'INVALID_STATE', status: 409 })
    })
  })

  describe('reads', () => {
    it('should hide another caller\'s tasks', async () => {
      const { tasks } = build()
      const { taskId } = await tasks.createTask(imageRequest(), { userId: 'alice' })

      await expect(tasks.getStatus(taskId, { userId: 'bob' })).rejects.toMatchObject({ code: 'TASK_NOT_FOUND' })
      await expect(tasks.cancel(taskId, { userId: 'bob' })).rejects.toMatchObject({ code: 'TASK_NOT_FOUND' })
      expect((await tasks.listTasks({}, { userId: 'alice' })).tasks.map((t) => t.taskId)).toEqual([taskId])
      expect((await tasks.listTasks({}, { userId: 'bob' })).tasks).toEqual([])
    })

    it('should filter the list by status and reject unknown ones', async () => {
      const { tasks } = build()
      const kept = await tasks.createTask(imageRequest())
      const cancelled = await tasks.createTask(imageRequest())
      await tasks.cancel(cancelled.taskId)

      const listed = await tasks.listTasks({ status: 'queued', limit: '10' })
      expect(listed.tasks.map((t) => t.taskId)).toEqual([kept.taskId])
      expect(listed.limit).toBe(10)
      await expect(tasks.listTasks({ status: 'bogus' })).rejects.toMatchObject({ code: 'VALIDATION_FAILED' })
    })

    it('should summarize webhook deliveries in the status', async () => {
      const { tasks } = build()
      await orchestrator.start()
      const { taskId } = await tasks.createTask(imageRequest({ webhookUrl: 'https://hooks.test/receiver' }))

      await waitFor(async () => (await tasks.webhookDeliveries(taskId)).length === 1)
      expect(await tasks.getStatus(taskId)).toMatchObject({
        status: 'queued',
        queuePosition: 1,
        webhook: { pending: 1, delivered: 0, failed: 0 },
      })
    })

    it('should aggregate statistics across tasks', async () => {
      const provider = new FakeProvider('mixed', ['image_generation'], [
        { kind: 'ok', cost: 0.25 },
        { kind: 'ok', cost: 0.25 },
        { kind: 'error', error: new PermanentProviderError('prompt rejected') },
      ])
      const { tasks } = build([provider])
      await orchestrator.start()
      for (let i = 0; i < 3; i++) await tasks.createTask(imageRequest())

      await waitFor(async () => {
        const stats = await tasks.statistics()
        return stats.byState.completed + stats.byState.failed === 3 && stats.running === 0
      })
      const stats = await tasks.statistics()
      expect(stats).toMatchObject({ total: 3, totalCost: 0.5, queueDepth: 0, running: 0 })
      expect(stats.byState).toMatchObject({ completed: 2, failed: 1, queued: 0 })
      expect(stats.byType.image_generation).toBe(3)
      expect(stats.successRate).toBeCloseTo(2 / 3)
    })
  })

  describe('pruneExpired', () => {
    it('should delete terminal tasks past retention and keep the rest', async () => {
      const clock = new ManualClock()
      const { tasks } = build([], clock.now)
      const done = await tasks.createTask(imageRequest())
      const waiting = await tasks.createTask(imageRequest())
      await tasks.cancel(done.taskId)

      clock.advance(2 * 60 * 60 * 1000)
      expect(await tasks.pruneExpired(60 * 60 * 1000)).toBe(1)
      await expect(tasks.getStatus(done.taskId)).rejects.toMatchObject({ code: 'TASK_NOT_FOUND' })
      expect(await statusOf(waiting.taskId)).toBe('queued')
    })
  })
})
