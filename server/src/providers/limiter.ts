/**
 * Per-provider admission control: a token bucket for request rate and a counting semaphore for
 * in-flight requests. Both live in plain counters mutated synchronously, so an acquire either takes
 * a token and a slot together or takes nothing.
 */
import type { ProviderLimits } from '../models/Provider'
import { getLogger } from '../lib/logger'

const log = getLogger('worker')

interface Bucket {
  capacity: number
  tokens: number
  /** Tokens added per millisecond. */
  refillPerMs: number
  lastRefillAt: number
}

interface ProviderSlots {
  bucket: Bucket | null
  maxConcurrent: number | null
  inFlight: number
}

export type ReleaseListener = (providerId: string) => void

export class ProviderLimiter {
  private readonly slots = new Map<string, ProviderSlots>()
  private readonly listeners = new Set<ReleaseListener>()
  private readonly now: () => number

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now
  }

  /** Set or replace limits. In-flight counts survive a reconfigure. */
  configure(providerId: string, limits: ProviderLimits = {}): void {
    const rate = limits.ratePerSecond
    const bucket: Bucket | null =
      rate !== undefined && rate > 0
        ? {
            capacity: Math.max(1, limits.burst ?? Math.ceil(rate)),
            tokens: Math.max(1, limits.burst ?? Math.ceil(rate)),
            refillPerMs: rate / 1000,
            lastRefillAt: this.now(),
          }
        : null
    const maxConcurrent =
      limits.maxConcurrent !== undefined && limits.maxConcurrent > 0 ? Math.floor(limits.maxConcurrent) : null
    const existing = this.slots.get(providerId)
    this.slots.set(providerId, { bucket, maxConcurrent, inFlight: existing?.inFlight ?? 0 })
  }

  remove(providerId: string): void {
    this.slots.delete(providerId)
  }

  onRelease(listener: ReleaseListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  tryAcquire(providerId: string): boolean {
    const slots = this.ensure(providerId)
    if (slots.maxConcurrent !== null && slots.inFlight >= slots.maxConcurrent) return false
    if (slots.bucket) {
      this.refill(slots.bucket)
      if (slots.bucket.tokens < 1) return false
      slots.bucket.tokens -= 1
    }
    slots.inFlight += 1
    return true
  }

  release(providerId: string): void {
    const slots = this.slots.get(providerId)
    if (!slots || slots.inFlight === 0) {
      log.warn({ msg: 'Limiter release without matching acquire', providerId })
      return
    }
    slots.inFlight -= 1
    for (const listener of this.listeners) {
      try {
        listener(providerId)
      } catch (err) {
        log.error({ msg: 'Limiter release listener threw', providerId, err })
      }
    }
  }

  inFlight(providerId: string): number {
    return this.slots.get(providerId)?.inFlight ?? 0
  }

  /** In-flight share of the concurrency cap, 0 when uncapped. */
  load(providerId: string): number {
    const slots = this.slots.get(providerId)
    if (!slots || slots.maxConcurrent === null) return 0
    return Math.min(1, slots.inFlight / slots.maxConcurrent)
  }

  /** Whether tryAcquire would succeed right now. Does not consume anything. */
  hasCapacity(providerId: string): boolean {
    const slots = this.slots.get(providerId)
    if (!slots) return true
    if (slots.maxConcurrent !== null && slots.inFlight >= slots.maxConcurrent) return false
    if (!slots.bucket) return true
    this.refill(slots.bucket)
    return slots.bucket.tokens >= 1
  }

  /** Milliseconds until the next token is available; 0 when one is available now or there is no rate limit. */
  msUntilToken(providerId: string): number {
    const bucket = this.slots.get(providerId)?.bucket
    if (!bucket) return 0
    this.refill(bucket)
    if (bucket.tokens >= 1) return 0
    return Math.ceil((1 - bucket.tokens) / bucket.refillPerMs)
  }

  private ensure(providerId: string): ProviderSlots {
    let slots = this.slots.get(providerId)
    if (!slots) {
      slots = { bucket: null, maxConcurrent: null, inFlight: 0 }
      this.slots.set(providerId, slots)
    }
    return slots
  }

  private refill(bucket: Bucket): void {
    const now = this.now()
    const elapsed = now - bucket.lastRefillAt
    if (elapsed <= 0) return
    bucket.tokens = Math.min(bucket.capacity, bucket.tokens + elapsed * bucket.refillPerMs)
    bucket.lastRefillAt = now
  }
}
