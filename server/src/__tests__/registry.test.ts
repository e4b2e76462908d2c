import { describe, it, expect, beforeEach } from 'vitest'
import type { HealthStatus } from '../models/Provider'
import type { RegistryOptions } from '../providers/registry'
import { ProviderRegistry } from '../providers/registry'
import { FakeProvider, ManualClock, testConfig } from './helpers'

class BrokenHealthProvider extends FakeProvider {
  async healthCheck(): Promise<HealthStatus> {
    throw new Error('connection refused')
  }
}

function registryOptions(clock: ManualClock, overrides: Partial<RegistryOptions> = {}): RegistryOptions {
  const { healthProbeIntervalMs: _interval, ...registry } = testConfig().registry
  return { ...registry, now: clock.now, ...overrides }
}

describe('ProviderRegistry', () => {
  let clock: ManualClock
  let registry: ProviderRegistry
  let a: FakeProvider
  let b: FakeProvider

  beforeEach(() => {
    clock = new ManualClock()
    registry = new ProviderRegistry(registryOptions(clock))
    a = new FakeProvider('a')
    b = new FakeProvider('b')
    registry.register(a)
    registry.register(b)
  })

  const ids = () => registry.list('image_generation').map((p) => p.id)

  it('should rank the provider with the better success rate first', () => {
    registry.reportOutcome('a', { success: false, latencyMs: 100 })
    registry.reportOutcome('a', { success: false, latencyMs: 100 })
    registry.reportOutcome('b', { success: true, latencyMs: 100 })
    registry.reportOutcome('b', { success: true, latencyMs: 100 })

    expect(ids()).toEqual(['b', 'a'])
    expect(registry.state('a')?.successRate).toBeCloseTo(0.64)
    expect(registry.state('a')?.healthStatus).toBe('healthy')
  })

  it('should score a fresh provider from its defaults', () => {
    const snapshot = registry.snapshot().find((p) => p.id === 'a')
    expect(snapshot?.score).toBeCloseTo(0.9)
  })

  it('should degrade after consecutive failures and recover after the cooldown', () => {
    for (let i = 0; i < 3; i++) registry.reportOutcome('a', { success: false, latencyMs: 100 })

    expect(registry.state('a')?.healthStatus).toBe('degraded')
    expect(registry.state('a')?.degradedUntil).toBe(clock.now() + 60_000)
    expect(ids()).toEqual(['b', 'a'])

    clock.advance(60_000)
    expect(registry.state('a')?.healthStatus).toBe('healthy')
    expect(registry.state('a')?.consecutiveFailures).toBe(0)
  })

  it('should keep a degraded provider eligible when it is the only one', () => {
    registry.unregister('b')
    for (let i = 0; i < 3; i++) registry.reportOutcome('a', { success: false, latencyMs: 100 })
    expect(registry.hasEligible('image_generation')).toBe(true)
    expect(ids()).toEqual(['a'])
  })

  it('should spend known credits and drop a provider that runs out', () => {
    const metered = new FakeProvider('metered', ['video_generation'])
    registry.register(metered, { creditBalance: 1, costPerUnit: 0.4 })

    registry.reportOutcome('metered', { success: true, latencyMs: 10 })
    expect(registry.state('metered')?.creditBalance).toBeCloseTo(0.6)

    registry.reportOutcome('metered', { success: true, latencyMs: 10, cost: 1 })
    expect(registry.state('metered')?.creditBalance).toBe(0)
    expect(registry.hasEligible('video_generation')).toBe(false)
    expect(registry.list('video_generation')).toEqual([])
  })

  it('should exclude a provider marked out of credit', () => {
    registry.markOutOfCredit('a')
    expect(ids()).toEqual(['b'])
    expect(registry.hasEligible('image_generation', ['b'])).toBe(false)
  })

  it('should put the preferred provider first when it is eligible', () => {
    registry.reportOutcome('a', { success: true, latencyMs: 10 })
    expect(registry.list('image_generation', { preferred: 'b' })[0]?.id).toBe('b')
  })

  it('should rotate providers whose scores tie', () => {
    expect(ids()).toEqual(['a', 'b'])
    expect(ids()).toEqual(['b', 'a'])
    expect(ids()).toEqual(['a', 'b'])
  })

  it('should honour exclusions and media types', () => {
    expect(registry.list('image_generation', { exclude: ['a'] }).map((p) => p.id)).toEqual(['b'])
    expect(registry.list('audio_transcription')).toEqual([])
  })

  it('should apply health check results for health and credits', async () => {
    a.health = 'unavailable'
    b.credits = 5
    await registry.refreshHealth()

    expect(registry.state('a')?.healthStatus).toBe('unavailable')
    expect(registry.state('b')?.creditBalance).toBe(5)
    expect(registry.state('b')?.lastCheckedAt).toBe(clock.now())
    expect(ids()).toEqual(['b'])

    a.health = 'healthy'
    await registry.refreshHealth()
    expect(registry.state('a')?.healthStatus).toBe('healthy')
  })

  it('should mark a provider unavailable when its health check throws', async () => {
    registry.register(new BrokenHealthProvider('broken'))
    await registry.refreshHealth()
    expect(registry.state('broken')?.healthStatus).toBe('unavailable')
  })

  it('should report load from the limiter hook in snapshots', () => {
    const loaded = new ProviderRegistry(registryOptions(clock, { load: (id) => (id === 'a' ? 0.5 : 0) }))
    loaded.register(a)
    expect(loaded.snapshot()[0]).toMatchObject({ id: 'a', load: 0.5 })
  })
})
