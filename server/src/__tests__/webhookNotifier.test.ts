import { describe, it, expect, beforeEach } from 'vitest'
import type { TaskRecord } from '../models/Task'
import type { WebhookPayload } from '../models/WebhookDelivery'
import { MemoryDeliveryRepository, MemoryTaskRepository } from '../store/memory'
import { TaskStore } from '../store/TaskStore'
import { RetryPolicy } from '../lib/retryPolicy'
import { signPayload, verifySignature } from '../lib/signature'
import { WebhookNotifier } from '../workers/webhookNotifier'
import { ManualClock, ManualDeliveryScheduler, makeTask, waitFor } from './helpers'

interface FetchCall {
  url: string
  headers: Headers
  body: string
}

function fakeFetch(statuses: (number | Error)[]): { impl: typeof fetch; calls: FetchCall[] } {
  const calls: FetchCall[] = []
  const impl: typeof fetch = async (input, init) => {
    calls.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : '',
    })
    const next = statuses[Math.min(calls.length - 1, statuses.length - 1)]
    if (next instanceof Error) throw next
    return new Response(null, { status: next })
  }
  return { impl, calls }
}

/** Hands out the current list at call time, then holds it back until released. */
class HeldDeliveryRepository extends MemoryDeliveryRepository {
  waiting = 0
  private holding = false
  private waiters: (() => void)[] = []

  hold(): void {
    this.holding = true
  }

  release(): void {
    this.holding = false
    for (const resume of this.waiters.splice(0)) resume()
  }

  async listForTask(taskId: string) {
    const snapshot = await super.listForTask(taskId)
    if (this.holding) {
      this.waiting += 1
      await new Promise<void>((resolve) => this.waiters.push(resolve))
    }
    return snapshot
  }
}

function parsePayload(body: string): WebhookPayload {
  const parsed: WebhookPayload = JSON.parse(body)
  return parsed
}

describe('WebhookNotifier', () => {
  let clock: ManualClock
  let store: TaskStore
  let deliveries: MemoryDeliveryRepository
  let scheduler: ManualDeliveryScheduler
  let task: TaskRecord

  function notifier(statuses: (number | Error)[], defaultSecret?: string) {
    const fetcher = fakeFetch(statuses)
    const instance = new WebhookNotifier({
      deliveries,
      store,
      scheduler,
      retryPolicy: new RetryPolicy({
        maxAttempts: 5,
        baseDelayMs: 30_000,
        maxDelayMs: 2 * 60 * 60 * 1000,
        maxElapsedMs: 24 * 60 * 60 * 1000,
      }),
      requestTimeoutMs: 1000,
      defaultSecret,
      progressEventStep: 0.25,
      fetchImpl: fetcher.impl,
      now: clock.now,
    })
    scheduler.start((id) => instance.deliver(id))
    return { instance, calls: fetcher.calls }
  }

  beforeEach(async () => {
    clock = new ManualClock()
    store = new TaskStore(new MemoryTaskRepository(), { now: clock.now })
    deliveries = new MemoryDeliveryRepository()
    scheduler = new ManualDeliveryScheduler()
    task = makeTask({ webhookUrl: 'https://hooks.test/receiver', webhookSecret: 'test-secret' })
    await store.create(task)
  })

  it('should retry 500, 500, 200 with growing delays and stop once delivered', async () => {
    const { instance, calls } = notifier([500, 500, 200])
    const delivery = await instance.notify(task, 'task.created')
    if (!delivery) throw new Error('no delivery')

    expect(scheduler.scheduled).toEqual([{ deliveryId: delivery.id, delayMs: 0 }])
    await scheduler.runNext()
    expect(scheduler.scheduled).toEqual([{ deliveryId: delivery.id, delayMs: 30_000 }])

    clock.advance(30_000)
    await scheduler.runNext()
    expect(scheduler.scheduled).toEqual([{ deliveryId: delivery.id, delayMs: 60_000 }])

    clock.advance(60_000)
    await scheduler.runNext()

    expect(calls).toHaveLength(3)
    expect(scheduler.scheduled).toEqual([])
    const stored = await instance.status(delivery.id)
    expect(stored).toMatchObject({ attemptCount: 3, delivered: true, failed: false, lastStatusCode: 200 })
    expect(calls.map((c) => c.body)).toEqual([delivery.body, delivery.body, delivery.body])
  })

  it('should sign the body with the task secret', async () => {
    const { instance, calls } = notifier([200])
    await instance.notify(task, 'task.created')
    await scheduler.runNext()

    const [call] = calls
    const signature = call.headers.get('x-webhook-signature')
    expect(signature).toBe(signPayload(call.body, 'test-secret'))
    expect(verifySignature(call.body, signature ?? undefined, 'test-secret')).toBe(true)
    expect(call.headers.get('x-webhook-event')).toBe('task.created')
    expect(call.headers.get('content-type')).toBe('application/json')
    expect(call.headers.get('x-webhook-timestamp')).toBe(String(Math.floor(clock.now() / 1000)))
    expect(call.url).toBe('https://hooks.test/receiver')
    expect(parsePayload(call.body)).toEqual({
      event_type: 'task.created',
      task_id: 'task-1',
      timestamp: new Date(clock.now()).toISOString(),
      data: { status: 'queued', progress: 0 },
    })
  })

  it('should fall back to the default secret and send unsigned without one', async () => {
    const unsignedTask = makeTask({ id: 'task-2', webhookUrl: 'https://hooks.test/receiver' })
    await store.create(unsignedTask)

    const signed = notifier([200], 'default-secret')
    await signed.instance.notify(unsignedTask, 'task.created')
    await scheduler.runNext()
    expect(signed.calls[0]?.headers.get('x-webhook-signature')).toBe(signPayload(signed.calls[0]?.body ?? '', 'default-secret'))

    const unsigned = notifier([200])
    await unsigned.instance.notify(unsignedTask, 'task.dispatched')
    await scheduler.runNext()
    expect(unsigned.calls[0]?.headers.has('x-webhook-signature')).toBe(false)
  })

  it('should include output on completion and the error on failure', async () => {
    const { instance } = notifier([200])
    const completed = await instance.notify({ ...task, state: 'completed', progress: 1, output: { url: 'asset-1' } }, 'task.completed')
    const failed = await instance.notify({ ...task, state: 'failed', lastError: 'boom' }, 'task.failed')

    expect(parsePayload(completed?.body ?? '{}').data).toEqual({ status: 'completed', progress: 1, output: { url: 'asset-1' } })
    expect(parsePayload(failed?.body ?? '{}').data).toEqual({ status: 'failed', progress: 0, error: 'boom' })
  })

  it('should give up after five attempts without touching the task', async () => {
    const { instance, calls } = notifier([503])
    const delivery = await instance.notify(task, 'task.created')
    if (!delivery) throw new Error('no delivery')

    for (let i = 0; i < 5; i++) {
      const next = scheduler.scheduled[0]
      clock.advance(next?.delayMs ?? 0)
      await scheduler.runNext()
    }

    expect(calls).toHaveLength(5)
    expect(scheduler.scheduled).toEqual([])
    expect(await instance.status(delivery.id)).toMatchObject({ attemptCount: 5, delivered: false, failed: true })
    expect((await store.get('task-1'))?.state).toBe('queued')
    expect(await instance.summaryForTask('task-1')).toEqual({ pending: 0, delivered: 0, failed: 1 })
  })

  it('should retry when the receiver cannot be reached', async () => {
    const { instance } = notifier([new Error('ECONNREFUSED'), 200])
    const delivery = await instance.notify(task, 'task.created')
    if (!delivery) throw new Error('no delivery')

    await scheduler.runNext()

    expect(await instance.status(delivery.id)).toMatchObject({ attemptCount: 1, lastError: 'ECONNREFUSED' })
    expect(scheduler.scheduled[0]?.delayMs).toBe(30_000)
  })

  it('should deliver a task\'s events one at a time in order', async () => {
    const { instance, calls } = notifier([500, 200])
    const first = await instance.notify(task, 'task.created')
    const second = await instance.notify({ ...task, state: 'dispatched' }, 'task.dispatched')

    expect(first?.sequence).toBe(1)
    expect(second?.sequence).toBe(2)
    expect(scheduler.scheduled.map((s) => s.deliveryId)).toEqual([first?.id])

    await scheduler.runNext()
    expect(scheduler.scheduled.map((s) => s.deliveryId)).toEqual([first?.id])
    clock.advance(30_000)
    await scheduler.runNext()
    expect(scheduler.scheduled).toEqual([{ deliveryId: second?.id, delayMs: 0 }])
    await scheduler.runNext()

    expect(calls.map((c) => parsePayload(c.body).event_type)).toEqual(['task.created', 'task.created', 'task.dispatched'])
  })

  it('should send progress only when it crosses the next step', async () => {
    const { instance } = notifier([200])
    const processing = { ...task, state: 'processing' as const }

    expect(await instance.notify({ ...processing, progress: 0.1 }, 'task.progress')).toBeNull()
    expect(await instance.notify({ ...processing, progress: 0.3 }, 'task.progress')).not.toBeNull()
    expect(await instance.notify({ ...processing, progress: 0.4 }, 'task.progress')).toBeNull()
    expect(await instance.notify({ ...processing, progress: 0.55 }, 'task.progress')).not.toBeNull()
  })

  it('should skip tasks without a webhook URL', async () => {
    const { instance } = notifier([200])
    expect(await instance.notify(makeTask({ id: 'quiet' }), 'task.created')).toBeNull()
    expect(scheduler.scheduled).toEqual([])
  })

  it('should record events from task changes once started', async () => {
    const { instance } = notifier([200])
    instance.start()
    await store.transition('task-1', 'dispatched')

    await waitFor(async () => (await instance.listForTask('task-1')).length === 1)
    const [delivery] = await instance.listForTask('task-1')
    expect(delivery?.eventType).toBe('task.dispatched')
    await instance.stop()
  })

  it('should reschedule open deliveries on resume', async () => {
    const { instance } = notifier([500])
    const delivery = await instance.notify(task, 'task.created')
    if (!delivery) throw new Error('no delivery')
    await scheduler.runNext()

    const fresh = new ManualDeliveryScheduler()
    scheduler = fresh
    const restarted = notifier([200]).instance
    clock.advance(10_000)

    expect(await restarted.resume()).toBe(1)
    expect(fresh.scheduled).toEqual([{ deliveryId: delivery.id, delayMs: 20_000 }])
  })

  it('should schedule an event recorded while the previous head is being retired', async () => {
    const held = new HeldDeliveryRepository()
    deliveries = held
    const { instance } = notifier([200])
    await instance.notify(task, 'task.created')

    held.hold()
    const delivering = scheduler.runNext()
    await waitFor(() => held.waiting === 1)
    const recording = instance.notify({ ...task, state: 'dispatched' }, 'task.dispatched')
    held.release()
    await delivering
    const second = await recording

    expect(second?.sequence).toBe(2)
    expect(scheduler.scheduled).toEqual([{ deliveryId: second?.id, delayMs: 0 }])
  })

  it('should move the queue along when another notifier delivered the head', async () => {
    const recorder = notifier([200]).instance
    const first = await recorder.notify(task, 'task.created')
    const second = await recorder.notify({ ...task, state: 'dispatched' }, 'task.dispatched')
    expect(scheduler.scheduled.map((s) => s.deliveryId)).toEqual([first?.id])

    const { calls } = notifier([200])
    await scheduler.runNext()

    expect(calls).toHaveLength(1)
    expect(scheduler.scheduled).toEqual([{ deliveryId: second?.id, delayMs: 0 }])
  })

  it('should drop per-task state once a task has nothing left to deliver', async () => {
    const { instance } = notifier([200])
    await instance.notify({ ...task, state: 'processing', progress: 0.5 }, 'task.progress')
    await scheduler.runNext()
    const completed = await instance.notify({ ...task, state: 'completed', progress: 1 }, 'task.completed')
    await scheduler.runNext()

    expect(completed?.sequence).toBe(2)
    expect(instance.trackedTasks()).toBe(0)
  })
})
