/**
 * Provider registry: which backends exist, what they can do and how well they are doing.
 * Success rate and latency are exponential moving averages fed by the dispatcher; health moves
 * healthy -> degraded on a failure streak and back after a cooldown or a passing probe.
 */
import type { TaskType } from '../models/Task'
import type {
  HealthStatus,
  MediaProvider,
  ProviderOptions,
  ProviderOutcome,
  ProviderState,
} from '../models/Provider'
import type { RegistryConfig } from '../config'
import { errorMessage } from '../lib/errors'
import { withTimeout } from '../lib/timeout'
import { getLogger } from '../lib/logger'

const log = getLogger('worker')

/** Scores closer than this are treated as a tie and rotated. */
const SCORE_TIE_EPSILON = 0.01

export type RegistryOptions = Omit<RegistryConfig, 'healthProbeIntervalMs'> & {
  now?: () => number
  /** In-flight share of capacity per provider, usually ProviderLimiter.load. */
  load?: (providerId: string) => number
}

export interface ListOptions {
  exclude?: readonly string[]
  preferred?: string
}

export interface ProviderSnapshot extends ProviderState {
  score: number
  load: number
}

interface Entry {
  provider: MediaProvider
  state: ProviderState
}

export class ProviderRegistry {
  private readonly entries = new Map<string, Entry>()
  private readonly rotation = new Map<TaskType, number>()
  private readonly now: () => number
  private readonly load: (providerId: string) => number
  private probing = false

  constructor(private readonly options: RegistryOptions) {
    this.now = options.now ?? Date.now
    this.load = options.load ?? (() => 0)
  }

  register(provider: MediaProvider, options: ProviderOptions = {}): void {
    if (this.entries.has(provider.id)) {
      log.warn({ msg: 'Provider re-registered; previous metrics discarded', providerId: provider.id })
    }
    this.entries.set(provider.id, {
      provider,
      state: {
        id: provider.id,
        mediaTypes: [...provider.mediaTypes],
        healthStatus: 'healthy',
        creditBalance: options.creditBalance ?? null,
        costPerUnit: options.costPerUnit ?? 0,
        avgLatencyMs: null,
        successRate: 1,
        consecutiveFailures: 0,
        degradedUntil: null,
        lastCheckedAt: null,
        totalRequests: 0,
        failedRequests: 0,
      },
    })
    log.info({ msg: 'Provider registered', providerId: provider.id, mediaTypes: provider.mediaTypes })
  }

  unregister(providerId: string): boolean {
    const removed = this.entries.delete(providerId)
    if (removed) log.info({ msg: 'Provider unregistered', providerId })
    return removed
  }

  get(providerId: string): MediaProvider | undefined {
    return this.entries.get(providerId)?.provider
  }

  state(providerId: string): ProviderState | undefined {
    const entry = this.entries.get(providerId)
    if (!entry) return undefined
    this.recoverIfCooled(entry.state)
    return { ...entry.state }
  }

  /** Whether some provider outside `exclude` is eligible for the type right now. Does not advance rotation. */
  hasEligible(mediaType: TaskType, exclude: readonly string[] = []): boolean {
    for (const { state } of this.entries.values()) {
      if (exclude.includes(state.id) || !state.mediaTypes.includes(mediaType)) continue
      this.recoverIfCooled(state)
      if (isEligible(state)) return true
    }
    return false
  }

  /**
   * Eligible providers for a media type, best first: healthy before degraded, then by composite score.
   * Near-equal scores are rotated between calls. `preferred`, when eligible, goes first.
   */
  list(mediaType: TaskType, options: ListOptions = {}): MediaProvider[] {
    const excluded = new Set(options.exclude ?? [])
    const candidates: { entry: Entry; score: number }[] = []
    for (const entry of this.entries.values()) {
      const { state } = entry
      if (excluded.has(state.id) || !state.mediaTypes.includes(mediaType)) continue
      this.recoverIfCooled(state)
      if (!isEligible(state)) continue
      candidates.push({ entry, score: this.score(state) })
    }

    const band = (status: HealthStatus) => (status === 'healthy' ? 0 : 1)
    candidates.sort((a, b) => band(a.entry.state.healthStatus) - band(b.entry.state.healthStatus) || b.score - a.score)

    const turn = this.rotation.get(mediaType) ?? 0
    this.rotation.set(mediaType, turn + 1)
    const ordered = rotateTies(candidates, turn).map((c) => c.entry.provider)

    if (options.preferred) {
      const index = ordered.findIndex((p) => p.id === options.preferred)
      if (index > 0) ordered.unshift(...ordered.splice(index, 1))
    }
    return ordered
  }

  reportOutcome(providerId: string, outcome: ProviderOutcome): void {
    const entry = this.entries.get(providerId)
    if (!entry) return
    const { state } = entry
    const alpha = this.options.emaAlpha
    const now = this.now()

    state.totalRequests += 1
    state.successRate = alpha * (outcome.success ? 1 : 0) + (1 - alpha) * state.successRate
    if (outcome.latencyMs >= 0) {
      state.avgLatencyMs =
        state.avgLatencyMs === null ? outcome.latencyMs : alpha * outcome.latencyMs + (1 - alpha) * state.avgLatencyMs
    }

    if (outcome.success) {
      state.consecutiveFailures = 0
      if (state.creditBalance !== null) {
        const spent = outcome.cost ?? state.costPerUnit
        state.creditBalance = Math.max(0, state.creditBalance - spent)
      }
      return
    }

    state.failedRequests += 1
    state.consecutiveFailures += 1
    if (state.consecutiveFailures >= this.options.failureThreshold && state.healthStatus === 'healthy') {
      state.healthStatus = 'degraded'
      state.degradedUntil = now + this.options.cooldownMs
      log.warn({
        msg: 'Provider degraded after consecutive failures',
        providerId,
        consecutiveFailures: state.consecutiveFailures,
        degradedUntil: new Date(state.degradedUntil).toISOString(),
      })
    }
  }

  markOutOfCredit(providerId: string): void {
    const entry = this.entries.get(providerId)
    if (!entry) return
    entry.state.creditBalance = 0
    log.warn({ msg: 'Provider marked out of credit', providerId })
  }

  /** Probe every provider's health and credits, each under the probe timeout. */
  async refreshHealth(): Promise<void> {
    const timeoutMs = this.options.probeTimeoutMs
    await Promise.all(
      [...this.entries.values()].map(async ({ provider, state }) => {
        let status: HealthStatus
        try {
          status = await withTimeout(provider.healthCheck(), timeoutMs, `${provider.id} health check`)
        } catch (err) {
          log.warn({ msg: 'Provider health check failed', providerId: provider.id, error: errorMessage(err) })
          status = 'unavailable'
        }
        this.applyProbe(state, status)

        try {
          const credits = await withTimeout(provider.getCredits(), timeoutMs, `${provider.id} credit check`)
          if (credits !== null) state.creditBalance = Math.max(0, credits)
        } catch (err) {
          log.warn({ msg: 'Provider credit check failed', providerId: provider.id, error: errorMessage(err) })
        }
        state.lastCheckedAt = this.now()
      })
    )
  }

  /** Run refreshHealth on an interval; returns a stop function. Overlapping probes are skipped. */
  startHealthProbes(intervalMs: number): () => void {
    const tick = () => {
      if (this.probing) return
      this.probing = true
      this.refreshHealth()
        .catch((err) => log.error({ msg: 'Health probe pass failed', err }))
        .finally(() => {
          this.probing = false
        })
    }
    const timer = setInterval(tick, intervalMs)
    timer.unref()
    return () => clearInterval(timer)
  }

  snapshot(): ProviderSnapshot[] {
    return [...this.entries.values()].map(({ state }) => {
      this.recoverIfCooled(state)
      return { ...state, mediaTypes: [...state.mediaTypes], score: this.score(state), load: this.load(state.id) }
    })
  }

  private score(state: ProviderState): number {
    const { weights, latencyRefMs } = this.options
    // Unmeasured latency scores as if it sat exactly at the reference
    const latency = state.avgLatencyMs ?? latencyRefMs
    return (
      weights.success * state.successRate +
      weights.latency * (1 / (1 + latency / latencyRefMs)) +
      weights.cost * (1 / (1 + state.costPerUnit)) +
      weights.load * (1 - this.load(state.id))
    )
  }

  private applyProbe(state: ProviderState, status: HealthStatus): void {
    const previous = state.healthStatus
    if (status === 'healthy') {
      state.healthStatus = 'healthy'
      state.degradedUntil = null
      state.consecutiveFailures = 0
    } else if (status === 'degraded') {
      if (previous !== 'degraded') state.degradedUntil = this.now() + this.options.cooldownMs
      state.healthStatus = 'degraded'
    } else {
      state.healthStatus = 'unavailable'
      state.degradedUntil = null
    }
    if (previous !== state.healthStatus) {
      log.info({ msg: 'Provider health changed', providerId: state.id, from: previous, to: state.healthStatus })
    }
  }

  private recoverIfCooled(state: ProviderState): void {
    if (state.healthStatus !== 'degraded' || state.degradedUntil === null) return
    if (this.now() < state.degradedUntil) return
    state.healthStatus = 'healthy'
    state.degradedUntil = null
    state.consecutiveFailures = 0
    log.info({ msg: 'Provider cooldown elapsed; back to healthy', providerId: state.id })
  }
}

function isEligible(state: ProviderState): boolean {
  if (state.healthStatus === 'unavailable') return false
  return state.creditBalance === null || state.creditBalance > 0
}

/** Rotate each run of near-equal scores within a health band by `turn`. */
function rotateTies<T extends { entry: Entry; score: number }>(sorted: T[], turn: number): T[] {
  const out: T[] = []
  let i = 0
  while (i < sorted.length) {
    const head = sorted[i]
    let j = i + 1
    while (
      j < sorted.length &&
      sorted[j].entry.state.healthStatus === head.entry.state.healthStatus &&
      head.score - sorted[j].score < SCORE_TIE_EPSILON
    ) {
      j += 1
    }
    const group = sorted.slice(i, j)
    const shift = turn % group.length
    out.push(...group.slice(shift), ...group.slice(0, shift))
    i = j
  }
  return out
}
