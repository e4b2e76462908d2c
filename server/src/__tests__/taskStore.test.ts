import { describe, it, expect, beforeEach } from 'vitest'
import { TASK_STATES, canTransition, isTerminalState } from '../models/Task'
import type { TaskRecord } from '../models/Task'
import { MemoryTaskRepository } from '../store/memory'
import type { StoreWriteResult, TaskChange } from '../store/TaskStore'
import { TaskStore } from '../store/TaskStore'
import { ManualClock, makeTask } from './helpers'

/** Lets another writer slip in before the first compare-and-set. */
class RacingRepository extends MemoryTaskRepository {
  raced = false

  async compareAndSet(task: TaskRecord, expectedVersion: number): Promise<boolean> {
    if (!this.raced) {
      this.raced = true
      const current = await this.get(task.id)
      if (current) {
        await super.compareAndSet({ ...current, metadata: { other: true }, version: current.version + 1 }, current.version)
      }
    }
    return super.compareAndSet(task, expectedVersion)
  }
}

/** Small seeded generator so a failing sequence can be replayed from its seed. */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

async function toProcessing(store: TaskStore, id: string): Promise<void> {
  await store.transition(id, 'dispatched')
  await store.transition(id, 'processing')
}

describe('task state machine', () => {
  it('should allow only the documented edges', () => {
    expect(canTransition('queued', 'dispatched')).toBe(true)
    expect(canTransition('dispatched', 'processing')).toBe(true)
    expect(canTransition('processing', 'queued')).toBe(true)
    expect(canTransition('queued', 'processing')).toBe(false)
    expect(canTransition('queued', 'completed')).toBe(false)
    expect(canTransition('completed', 'queued')).toBe(false)
    expect(canTransition('cancelled', 'failed')).toBe(false)
  })

  it('should treat completed, failed and cancelled as terminal', () => {
    expect(isTerminalState('completed')).toBe(true)
    expect(isTerminalState('failed')).toBe(true)
    expect(isTerminalState('cancelled')).toBe(true)
    expect(isTerminalState('processing')).toBe(false)
  })
})

describe('task state machine under random operations', () => {
  const TASK_IDS = ['t0', 't1', 't2']

  it.each([1, 2, 3, 5, 8, 13, 21, 34])('should only ever take allowed edges (seed %i)', async (seed) => {
    const random = seededRandom(seed)
    const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)]
    const clock = new ManualClock()
    const store = new TaskStore(new MemoryTaskRepository(), { now: clock.now })
    const changes: TaskChange[] = []
    store.onChange((change) => changes.push(change))
    for (const id of TASK_IDS) await store.create(makeTask({ id }))

    for (let step = 0; step < 150; step++) {
      clock.advance(10)
      const id = pick(TASK_IDS)
      const before = await store.get(id)
      if (!before) throw new Error(`missing ${id}`)
      const roll = random()

      if (roll < 0.15) {
        const a = pick(TASK_STATES)
        const b = pick(TASK_STATES)
        const [first, second] = await Promise.all([store.transition(id, a), store.transition(id, b)])
        if (first.ok && second.ok) expect(canTransition(a, b) || canTransition(b, a)).toBe(true)
        continue
      }

      let result: StoreWriteResult
      let target = before.state
      if (roll < 0.75) {
        target = pick(TASK_STATES)
        result = await store.transition(id, target)
      } else if (roll < 0.9) {
        result = await store.patch(id, { metadata: { step } })
      } else {
        target = 'queued'
        result = await store.requeueFailed(id, random() < 0.5)
      }
      const after = await store.get(id)

      if (result.ok) {
        expect(after?.state).toBe(target)
        expect(after?.version).toBe(before.version + 1)
        if (roll < 0.75) expect(canTransition(before.state, target)).toBe(true)
        if (roll >= 0.9) expect(before.state).toBe('failed')
      } else {
        expect(after?.state).toBe(before.state)
        expect(after?.version).toBe(before.version)
      }
    }

    expect(changes.length).toBeGreaterThan(0)
    for (const { previous, task, event } of changes) {
      expect(task.version).toBe(previous.version + 1)
      if (event === 'task.retrying' && previous.state === 'failed') {
        expect(task.state).toBe('queued')
      } else {
        expect(canTransition(previous.state, task.state)).toBe(true)
      }
      if (isTerminalState(previous.state)) expect(previous.state).toBe('failed')
    }
  })
})

describe('TaskStore', () => {
  let clock: ManualClock
  let repo: MemoryTaskRepository
  let store: TaskStore

  beforeEach(async () => {
    clock = new ManualClock()
    repo = new MemoryTaskRepository()
    store = new TaskStore(repo, { now: clock.now })
    await store.create(makeTask())
  })

  it('should bump the version and record an event on each transition', async () => {
    clock.advance(1000)
    const result = await store.transition('task-1', 'dispatched', { assignedProvider: 'p1' })

    expect(result.ok).toBe(true)
    const task = await store.get('task-1')
    expect(task?.state).toBe('dispatched')
    expect(task?.version).toBe(1)
    expect(task?.assignedProvider).toBe('p1')
    expect(task?.updatedAt.getTime()).toBe(clock.now())
    const events = await store.events('task-1')
    expect(events.map((e) => e.type)).toEqual(['task.created', 'task.dispatched'])
  })

  it('should reject an edge the state machine does not allow', async () => {
    const result = await store.transition('task-1', 'completed')
    expect(result).toMatchObject({ ok: false, reason: 'invalid_transition' })
    expect((await store.get('task-1'))?.state).toBe('queued')
  })

  it('should refuse to leave a terminal state', async () => {
    await store.transition('task-1', 'cancelled')
    const result = await store.transition('task-1', 'queued')
    expect(result).toMatchObject({ ok: false, reason: 'invalid_transition' })
  })

  it('should report unexpected_state when the from-guard does not match', async () => {
    const result = await store.transition('task-1', 'cancelled', {}, { from: ['processing'] })
    expect(result).toMatchObject({ ok: false, reason: 'unexpected_state' })
  })

  it('should retry after a version conflict and keep the competing write', async () => {
    const racing = new RacingRepository()
    const racingStore = new TaskStore(racing, { now: clock.now })
    await racingStore.create(makeTask())

    const result = await racingStore.patch('task-1', { priority: 'high' })

    expect(result.ok).toBe(true)
    const task = await racingStore.get('task-1')
    expect(task?.priority).toBe('high')
    expect(task?.metadata).toEqual({ other: true })
    expect(task?.version).toBe(2)
  })

  it('should let exactly one of two racing terminal writes win', async () => {
    await toProcessing(store, 'task-1')

    const [completed, failed] = await Promise.all([
      store.transition('task-1', 'completed', { output: { ok: true } }),
      store.transition('task-1', 'failed', { errorCode: 'INTERNAL_ERROR' }),
    ])

    expect([completed.ok, failed.ok].filter(Boolean)).toHaveLength(1)
    const task = await store.get('task-1')
    expect(task?.state).toBe(completed.ok ? 'completed' : 'failed')
  })

  it('should apply progress only in order and never backwards', async () => {
    await toProcessing(store, 'task-1')

    expect(await store.applyProgress('task-1', 0.5, 2)).toBe(true)
    expect(await store.applyProgress('task-1', 0.7, 1)).toBe(false)
    expect(await store.applyProgress('task-1', 0.4, 3)).toBe(false)
    expect(await store.applyProgress('task-1', 0.8, 3)).toBe(true)

    const task = await store.get('task-1')
    expect(task?.progress).toBe(0.8)
    expect(task?.progressSeq).toBe(3)
  })

  it('should ignore progress for a task that is not processing', async () => {
    expect(await store.applyProgress('task-1', 0.5, 1)).toBe(false)
  })

  it('should requeue a failed task and clear its failure', async () => {
    await toProcessing(store, 'task-1')
    await store.transition('task-1', 'failed', { errorCode: 'RETRIES_EXHAUSTED', lastError: 'boom' })

    const result = await store.requeueFailed('task-1', true)

    expect(result.ok).toBe(true)
    const task = await store.get('task-1')
    expect(task?.state).toBe('queued')
    expect(task?.attemptCount).toBe(0)
    expect(task?.errorCode).toBeUndefined()
    expect(task?.lastError).toBeUndefined()
    const events = await store.events('task-1')
    expect(events[events.length - 1]).toMatchObject({ type: 'task.retrying', detail: { manual: true } })
  })

  it('should not requeue a task that has not failed', async () => {
    const result = await store.requeueFailed('task-1', true)
    expect(result).toMatchObject({ ok: false, reason: 'invalid_transition' })
  })

  it('should notify listeners of every accepted change in order', async () => {
    const seen: TaskChange[] = []
    const unsubscribe = store.onChange((change) => seen.push(change))

    await toProcessing(store, 'task-1')
    await store.applyProgress('task-1', 0.25, 1)
    await store.transition('task-1', 'completed')
    unsubscribe()
    await store.create(makeTask({ id: 'task-2' }))

    expect(seen.map((c) => c.event)).toEqual(['task.dispatched', 'task.started', 'task.progress', 'task.completed'])
    expect(seen[3].previous?.state).toBe('processing')
  })

  it('should prune only terminal tasks older than the cutoff', async () => {
    await store.create(makeTask({ id: 'task-2' }))
    await store.transition('task-2', 'cancelled')
    clock.advance(10_000)
    await store.create(makeTask({ id: 'task-3' }))
    await store.transition('task-3', 'cancelled')

    const removed = await store.pruneTerminal(new Date(clock.now() - 5_000))

    expect(removed).toBe(1)
    expect(await store.get('task-2')).toBeUndefined()
    expect(await store.get('task-1')).toBeDefined()
    expect(await store.get('task-3')).toBeDefined()
  })
})
