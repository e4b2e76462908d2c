import { v4 as uuidv4 } from 'uuid'
import type { TaskType } from '../models/Task'
import type { GenerateContext, GenerateResult, HealthStatus, MediaProvider } from '../models/Provider'
import { TransientProviderError } from '../lib/errors'
import { sleep } from '../lib/timeout'

export interface SimulatedProviderOptions {
  id: string
  mediaTypes: readonly TaskType[]
  /** Delay between progress steps. */
  stepDelayMs?: number
  /** Share of attempts that fail with a transient error, in [0, 1]. */
  failureRate?: number
  costPerRun?: number
  random?: () => number
}

const PROGRESS_STEPS = [0.1, 0.5, 0.8]

/**
 * Local-development backend: walks through a few progress steps and returns a fake asset URL.
 * No external calls; `failureRate` exercises the retry and failover paths.
 */
export class SimulatedProvider implements MediaProvider {
  readonly id: string
  readonly mediaTypes: readonly TaskType[]
  private readonly stepDelayMs: number
  private readonly failureRate: number
  private readonly costPerRun: number
  private readonly random: () => number

  constructor(options: SimulatedProviderOptions) {
    this.id = options.id
    this.mediaTypes = options.mediaTypes
    this.stepDelayMs = options.stepDelayMs ?? 1000
    this.failureRate = Math.min(1, Math.max(0, options.failureRate ?? 0))
    this.costPerRun = options.costPerRun ?? 0
    this.random = options.random ?? Math.random
  }

  async generate(input: Record<string, unknown>, ctx: GenerateContext): Promise<GenerateResult> {
    for (const step of PROGRESS_STEPS) {
      await sleep(this.stepDelayMs, ctx.signal)
      ctx.reportProgress(step)
    }
    if (this.random() < this.failureRate) {
      return { ok: false, error: new TransientProviderError('server_error', `${this.id} simulated upstream failure`) }
    }
    await sleep(this.stepDelayMs, ctx.signal)
    ctx.reportProgress(1)

    const assetId = uuidv4()
    const format = typeof input.format === 'string' ? input.format : undefined
    return {
      ok: true,
      output: {
        provider: this.id,
        assetUrl: `/simulated/${this.id}/${assetId}`,
        ...(format ? { format } : {}),
      },
      cost: this.costPerRun,
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    return 'healthy'
  }

  async getCredits(): Promise<number | null> {
    return null
  }
}
