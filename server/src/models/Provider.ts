import type { TaskType } from './Task'

export type HealthStatus = 'healthy' | 'degraded' | 'unavailable'

/** Progress sink handed to a provider binding for one attempt. Values are fractions in [0, 1]. */
export type ProgressReporter = (progress: number) => void

export interface GenerateContext {
  taskId: string
  type: TaskType
  attempt: number
  signal: AbortSignal
  reportProgress: ProgressReporter
}

export type GenerateResult =
  | { ok: true; output: unknown; cost?: number }
  | { ok: false; error: Error }

/**
 * What the orchestrator needs from an AI backend binding.
 * Bindings may also throw from generate(); thrown errors are classified the same way as returned ones.
 */
export interface MediaProvider {
  readonly id: string
  readonly mediaTypes: readonly TaskType[]
  generate(input: Record<string, unknown>, ctx: GenerateContext): Promise<GenerateResult>
  healthCheck(): Promise<HealthStatus>
  getCredits(): Promise<number | null>
}

export interface ProviderLimits {
  /** Sustained requests per second (token refill rate). Omit for no rate limit. */
  ratePerSecond?: number
  /** Bucket size; defaults to max(1, ratePerSecond). */
  burst?: number
  /** Max in-flight requests. Omit for no concurrency cap. */
  maxConcurrent?: number
}

export interface ProviderOptions extends ProviderLimits {
  costPerUnit?: number
  creditBalance?: number | null
}

export interface ProviderState {
  id: string
  mediaTypes: readonly TaskType[]
  healthStatus: HealthStatus
  creditBalance: number | null
  costPerUnit: number
  avgLatencyMs: number | null
  successRate: number
  consecutiveFailures: number
  degradedUntil: number | null
  lastCheckedAt: number | null
  totalRequests: number
  failedRequests: number
}

export interface ProviderOutcome {
  success: boolean
  latencyMs: number
  cost?: number
}
