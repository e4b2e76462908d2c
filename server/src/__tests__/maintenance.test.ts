import { describe, it, expect, afterEach, vi } from 'vitest'
import { createOrchestrator } from '../services/orchestrator'
import { startTaskCleanup } from '../services/maintenance'
import { createMemoryRepositories } from '../store/memory'
import { ManualDeliveryScheduler, testConfig } from './helpers'

describe('startTaskCleanup', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should prune once at start and then on every interval until stopped', async () => {
    vi.useFakeTimers()
    const { tasks } = createOrchestrator(testConfig(), {
      repositories: createMemoryRepositories(),
      providers: [],
      deliveryScheduler: new ManualDeliveryScheduler(),
    })
    const prune = vi.spyOn(tasks, 'pruneExpired').mockResolvedValue(0)

    const stop = startTaskCleanup(tasks, 1000, 60_000)
    expect(prune).toHaveBeenCalledTimes(1)
    expect(prune).toHaveBeenCalledWith(1000)

    await vi.advanceTimersByTimeAsync(120_000)
    expect(prune).toHaveBeenCalledTimes(3)

    stop()
    await vi.advanceTimersByTimeAsync(120_000)
    expect(prune).toHaveBeenCalledTimes(3)
  })
})
