import type { AppConfig } from '../config'
import { loadConfig } from '../config'
import type { TaskRecord, TaskType } from '../models/Task'
import type { GenerateContext, GenerateResult, HealthStatus, MediaProvider } from '../models/Provider'
import type { DeliveryHandler, DeliveryScheduler } from '../workers/deliveryScheduler'

export class ManualClock {
  constructor(public current = Date.UTC(2026, 0, 1)) {}

  now = (): number => this.current

  advance(ms: number): void {
    this.current += ms
  }
}

export type Step =
  | { kind: 'ok'; output?: unknown; cost?: number; progress?: number[] }
  | { kind: 'error'; error: Error }
  | { kind: 'throw'; error: unknown }
  /** Resolve only when the test calls release(). */
  | { kind: 'hold' }

/** Provider whose generate() follows a script of steps; the last step repeats. */
export class FakeProvider implements MediaProvider {
  readonly calls: { input: Record<string, unknown>; ctx: GenerateContext }[] = []
  health: HealthStatus = 'healthy'
  credits: number | null = null
  private readonly held: (() => void)[] = []

  constructor(
    readonly id: string,
    readonly mediaTypes: readonly TaskType[] = ['image_generation'],
    private readonly steps: Step[] = [{ kind: 'ok' }]
  ) {}

  async generate(input: Record<string, unknown>, ctx: GenerateContext): Promise<GenerateResult> {
    this.calls.push({ input, ctx })
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)]
    switch (step.kind) {
      case 'ok':
        for (const p of step.progress ?? []) ctx.reportProgress(p)
        return { ok: true, output: step.output ?? { provider: this.id }, cost: step.cost }
      case 'error':
        return { ok: false, error: step.error }
      case 'throw':
        throw step.error
      case 'hold':
        await new Promise<void>((resolve) => this.held.push(resolve))
        return { ok: true, output: { provider: this.id } }
    }
  }

  /** Let every held call return. */
  release(): void {
    for (const resolve of this.held.splice(0)) resolve()
  }

  heldCount(): number {
    return this.held.length
  }

  async healthCheck(): Promise<HealthStatus> {
    return this.health
  }

  async getCredits(): Promise<number | null> {
    return this.credits
  }
}

/** Records schedule() calls; the test decides when each delivery attempt runs. */
export class ManualDeliveryScheduler implements DeliveryScheduler {
  readonly scheduled: { deliveryId: string; delayMs: number }[] = []
  private handler: DeliveryHandler | null = null

  start(handler: DeliveryHandler): void {
    this.handler = handler
  }

  async schedule(deliveryId: string, delayMs: number): Promise<void> {
    this.scheduled.push({ deliveryId, delayMs })
  }

  /** Run the oldest scheduled attempt. */
  async runNext(): Promise<void> {
    const next = this.scheduled.shift()
    if (!next) throw new Error('Nothing scheduled')
    if (!this.handler) throw new Error('Scheduler not started')
    await this.handler(next.deliveryId)
  }

  async close(): Promise<void> {
    this.scheduled.length = 0
  }
}

export function makeTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  const at = new Date(Date.UTC(2026, 0, 1))
  return {
    id: 'task-1',
    type: 'image_generation',
    state: 'queued',
    priority: 'medium',
    input: { prompt: 'a red bicycle' },
    metadata: {},
    progress: 0,
    progressSeq: 0,
    attemptCount: 0,
    maxRetries: 3,
    attemptedProviders: [],
    cancelRequested: false,
    createdAt: at,
    updatedAt: at,
    enqueuedAt: at,
    version: 0,
    ...overrides,
  }
}

/** Config for in-process tests: tiny delays, no jitter, no simulated providers. */
export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    ENABLE_SIMULATED_PROVIDERS: 'false',
    RETRY_BASE_DELAY_MS: '1',
    RETRY_MAX_DELAY_MS: '5',
    RETRY_JITTER: '0',
    WEBHOOK_JITTER: '0',
    MIN_POLL_INTERVAL_MS: '1',
    MAX_POLL_INTERVAL_MS: '5',
    ...env,
  })
}

/** Poll until `check` holds; fails the test after `timeoutMs`. */
export async function waitFor(check: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!(await check())) {
    if (Date.now() > deadline) throw new Error('Condition not met in time')
    await new Promise((resolve) => setTimeout(resolve, 2))
  }
}
