/**
 * Orchestrator configuration from environment. Every knob has a documented default; none of the
 * time constants are load-bearing, they are starting points to tune per deployment.
 */
import { z } from 'zod'
import type { TaskType } from './models/Task'
import { TASK_TYPES } from './models/Task'

type Env = Record<string, string | undefined>

function isFlagEnabled(value: string | undefined, fallback = false): boolean {
  if (value == null || value.trim() === '') return fallback
  return /^(1|true|yes)$/i.test(value.trim())
}

function intFromEnv(value: string | undefined, fallback: number, min = 0): number {
  if (value == null || value.trim() === '') return fallback
  const parsed = parseInt(value, 10)
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback
}

function floatFromEnv(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') return fallback
  const parsed = parseFloat(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

const httpProviderSchema = z.object({
  id: z.string().min(1),
  baseUrl: z.string().url(),
  apiKey: z.string().optional(),
  mediaTypes: z.array(z.enum(TASK_TYPES)).min(1),
  costPerUnit: z.number().nonnegative().optional(),
  ratePerSecond: z.number().positive().optional(),
  burst: z.number().int().positive().optional(),
  maxConcurrent: z.number().int().positive().optional(),
  pollIntervalMs: z.number().int().positive().optional(),
})

export type HttpProviderConfig = z.infer<typeof httpProviderSchema>

export interface SchedulerConfig {
  workerConcurrency: number
  /** Tasks waiting longer than this are promoted one band per aging pass. */
  agingThresholdMs: number
  agingIntervalMs: number
  /** Queued tasks that cannot get any provider for this long fail with NO_PROVIDER_AVAILABLE. */
  noProviderMaxWaitMs: number
  minPollIntervalMs: number
  maxPollIntervalMs: number
}

export interface DispatchConfig {
  defaultMaxRetries: number
  retryBaseDelayMs: number
  retryMaxDelayMs: number
  retryJitter: number
  timeoutsMs: Record<TaskType, number>
}

export interface RegistryConfig {
  failureThreshold: number
  cooldownMs: number
  emaAlpha: number
  latencyRefMs: number
  weights: { success: number; latency: number; cost: number; load: number }
  healthProbeIntervalMs: number
  probeTimeoutMs: number
}

export interface WebhookConfig {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  maxElapsedMs: number
  jitter: number
  requestTimeoutMs: number
  defaultSecret?: string
  /** Progress events fire only when progress crosses a multiple of this step. */
  progressEventStep: number
}

export interface AppConfig {
  port: number
  databaseUrl?: string
  redisUrl?: string
  maxBatchSize: number
  retryResetsAttempts: boolean
  retentionMs: number
  cleanupIntervalMs: number
  scheduler: SchedulerConfig
  dispatch: DispatchConfig
  registry: RegistryConfig
  webhook: WebhookConfig
  providers: {
    openaiApiKey?: string
    simulated: boolean
    http: HttpProviderConfig[]
  }
}

function parseHttpProviders(raw: string | undefined): HttpProviderConfig[] {
  if (!raw || !raw.trim()) return []
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new Error(`HTTP_PROVIDERS is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  const parsed = z.array(httpProviderSchema).safeParse(json)
  if (!parsed.success) {
    throw new Error(`HTTP_PROVIDERS is invalid: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`)
  }
  return parsed.data
}

export function loadConfig(env: Env = process.env): AppConfig {
  const trimmed = (v: string | undefined) => (v && v.trim() ? v.trim() : undefined)
  return {
    port: intFromEnv(env.PORT, 3001),
    databaseUrl: trimmed(env.DATABASE_URL),
    redisUrl: trimmed(env.REDIS_URL),
    maxBatchSize: intFromEnv(env.MAX_BATCH_SIZE, 50, 1),
    retryResetsAttempts: isFlagEnabled(env.RETRY_RESETS_ATTEMPTS, true),
    retentionMs: intFromEnv(env.TASK_RETENTION_MS, 7 * 24 * 60 * 60 * 1000),
    cleanupIntervalMs: intFromEnv(env.CLEANUP_INTERVAL_MS, 60 * 60 * 1000, 1000),
    scheduler: {
      workerConcurrency: intFromEnv(env.WORKER_CONCURRENCY, 16, 1),
      agingThresholdMs: intFromEnv(env.AGING_THRESHOLD_MS, 60 * 1000, 1),
      agingIntervalMs: intFromEnv(env.AGING_INTERVAL_MS, 30 * 1000, 1),
      noProviderMaxWaitMs: intFromEnv(env.NO_PROVIDER_MAX_WAIT_MS, 10 * 60 * 1000),
      minPollIntervalMs: intFromEnv(env.MIN_POLL_INTERVAL_MS, 50, 1),
      maxPollIntervalMs: intFromEnv(env.MAX_POLL_INTERVAL_MS, 2000, 1),
    },
    dispatch: {
      defaultMaxRetries: intFromEnv(env.MAX_RETRIES, 3),
      retryBaseDelayMs: intFromEnv(env.RETRY_BASE_DELAY_MS, 1000),
      retryMaxDelayMs: intFromEnv(env.RETRY_MAX_DELAY_MS, 60 * 1000),
      retryJitter: floatFromEnv(env.RETRY_JITTER, 0.2),
      timeoutsMs: {
        image_generation: intFromEnv(env.TIMEOUT_IMAGE_MS, 2 * 60 * 1000, 1),
        video_generation: intFromEnv(env.TIMEOUT_VIDEO_MS, 10 * 60 * 1000, 1),
        audio_transcription: intFromEnv(env.TIMEOUT_AUDIO_MS, 5 * 60 * 1000, 1),
        subtitle_generation: intFromEnv(env.TIMEOUT_SUBTITLE_MS, 5 * 60 * 1000, 1),
      },
    },
    registry: {
      failureThreshold: intFromEnv(env.PROVIDER_FAILURE_THRESHOLD, 3, 1),
      cooldownMs: intFromEnv(env.PROVIDER_COOLDOWN_MS, 60 * 1000),
      emaAlpha: floatFromEnv(env.PROVIDER_EMA_ALPHA, 0.2),
      latencyRefMs: intFromEnv(env.PROVIDER_LATENCY_REF_MS, 5000, 1),
      weights: {
        success: floatFromEnv(env.SCORE_WEIGHT_SUCCESS, 0.5),
        latency: floatFromEnv(env.SCORE_WEIGHT_LATENCY, 0.2),
        cost: floatFromEnv(env.SCORE_WEIGHT_COST, 0.15),
        load: floatFromEnv(env.SCORE_WEIGHT_LOAD, 0.15),
      },
      healthProbeIntervalMs: intFromEnv(env.HEALTH_PROBE_INTERVAL_MS, 30 * 1000, 1000),
      probeTimeoutMs: intFromEnv(env.HEALTH_PROBE_TIMEOUT_MS, 5000, 1),
    },
    webhook: {
      maxAttempts: intFromEnv(env.WEBHOOK_MAX_ATTEMPTS, 5, 1),
      baseDelayMs: intFromEnv(env.WEBHOOK_BASE_DELAY_MS, 30 * 1000),
      maxDelayMs: intFromEnv(env.WEBHOOK_MAX_DELAY_MS, 2 * 60 * 60 * 1000),
      maxElapsedMs: intFromEnv(env.WEBHOOK_MAX_ELAPSED_MS, 24 * 60 * 60 * 1000),
      jitter: floatFromEnv(env.WEBHOOK_JITTER, 0.1),
      requestTimeoutMs: intFromEnv(env.WEBHOOK_TIMEOUT_MS, 10 * 1000, 1),
      defaultSecret: trimmed(env.WEBHOOK_DEFAULT_SECRET),
      progressEventStep: floatFromEnv(env.WEBHOOK_PROGRESS_STEP, 0.25),
    },
    providers: {
      openaiApiKey: trimmed(env.OPENAI_API_KEY),
      simulated: isFlagEnabled(env.ENABLE_SIMULATED_PROVIDERS, env.NODE_ENV !== 'production'),
      http: parseHttpProviders(env.HTTP_PROVIDERS),
    },
  }
}
