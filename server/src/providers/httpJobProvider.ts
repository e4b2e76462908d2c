/**
 * Binding for job-style HTTP generation APIs (video backends mostly): submit, then poll until the job
 * settles. Expected surface under `baseUrl`:
 *   POST /jobs            {type, input}        -> {id}
 *   GET  /jobs/:id                             -> {status, progress?, output?, error?, cost?}
 *   DELETE /jobs/:id                           (best effort on cancel/timeout)
 *   GET  /health                               -> 2xx when serving
 *   GET  /credits                              -> {balance}
 */
import { z } from 'zod'
import type { TaskType } from '../models/Task'
import type { GenerateContext, GenerateResult, HealthStatus, MediaProvider } from '../models/Provider'
import {
  InsufficientCreditsError,
  PermanentProviderError,
  TransientProviderError,
  errorMessage,
} from '../lib/errors'
import type { OrchestratorError } from '../lib/errors'
import { sleep } from '../lib/timeout'
import { getLogger } from '../lib/logger'

const log = getLogger('worker')

const submitResponse = z.object({ id: z.string().min(1) })

const jobResponse = z.object({
  status: z.enum(['queued', 'running', 'succeeded', 'failed']),
  progress: z.number().min(0).max(1).optional(),
  output: z.unknown().optional(),
  error: z.string().optional(),
  /** Set by some backends when a failure should not be retried. */
  retryable: z.boolean().optional(),
  cost: z.number().nonnegative().optional(),
})

const creditsResponse = z.object({ balance: z.number() })

export interface HttpJobProviderOptions {
  id: string
  baseUrl: string
  apiKey?: string
  mediaTypes: readonly TaskType[]
  pollIntervalMs?: number
  fetchImpl?: typeof fetch
}

export class HttpJobProvider implements MediaProvider {
  readonly id: string
  readonly mediaTypes: readonly TaskType[]
  private readonly baseUrl: string
  private readonly apiKey?: string
  private readonly pollIntervalMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: HttpJobProviderOptions) {
    this.id = options.id
    this.mediaTypes = options.mediaTypes
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.apiKey = options.apiKey
    this.pollIntervalMs = options.pollIntervalMs ?? 2000
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async generate(input: Record<string, unknown>, ctx: GenerateContext): Promise<GenerateResult> {
    const submitted = await this.request('POST', '/jobs', ctx.signal, { type: ctx.type, input })
    const parsedSubmit = submitResponse.safeParse(submitted)
    if (!parsedSubmit.success) {
      return { ok: false, error: new TransientProviderError('server_error', `${this.id} returned no job id`) }
    }
    const jobId = parsedSubmit.data.id

    try {
      for (;;) {
        const body = await this.request('GET', `/jobs/${encodeURIComponent(jobId)}`, ctx.signal)
        const job = jobResponse.safeParse(body)
        if (!job.success) {
          return { ok: false, error: new TransientProviderError('server_error', `${this.id} returned a malformed job`) }
        }
        const { status, progress, output, error, retryable, cost } = job.data
        if (progress !== undefined) ctx.reportProgress(progress)
        if (status === 'succeeded') return { ok: true, output, cost }
        if (status === 'failed') {
          const message = error || `${this.id} job ${jobId} failed`
          return {
            ok: false,
            error: retryable === false ? new PermanentProviderError(message) : new TransientProviderError('server_error', message),
          }
        }
        await sleep(this.pollIntervalMs, ctx.signal)
      }
    } catch (err) {
      if (ctx.signal.aborted) this.cancelRemote(jobId)
      throw err
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/health`, { headers: this.headers() })
      if (res.ok) return 'healthy'
      return res.status >= 500 ? 'degraded' : 'unavailable'
    } catch (err) {
      log.debug({ msg: 'Health request failed', providerId: this.id, error: errorMessage(err) })
      return 'unavailable'
    }
  }

  async getCredits(): Promise<number | null> {
    const res = await this.fetchImpl(`${this.baseUrl}/credits`, { headers: this.headers() })
    if (res.status === 404) return null
    if (!res.ok) throw this.statusError(res.status, 'credit check')
    const parsed = creditsResponse.safeParse(await res.json())
    return parsed.success ? parsed.data.balance : null
  }

  private async request(method: 'GET' | 'POST', path: string, signal: AbortSignal, body?: unknown): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(body !== undefined),
      body: body !== undefined ? JSON.stringify(body) : undefined,
      signal,
    })
    if (!res.ok) {
      const detail = await res.text().catch(() => '')
      throw this.statusError(res.status, `${method} ${path}${detail ? `: ${detail.slice(0, 200)}` : ''}`)
    }
    return res.json()
  }

  private statusError(status: number, what: string): OrchestratorError {
    const message = `${this.id} ${what} returned ${status}`
    if (status === 402) return new InsufficientCreditsError(this.id)
    if (status === 429) return new TransientProviderError('rate_limited', message)
    if (status === 408 || status >= 500) return new TransientProviderError('server_error', message)
    return new PermanentProviderError(message)
  }

  private cancelRemote(jobId: string): void {
    this.fetchImpl(`${this.baseUrl}/jobs/${encodeURIComponent(jobId)}`, { method: 'DELETE', headers: this.headers() })
      .then((res) => {
        if (!res.ok) log.warn({ msg: 'Remote job cancel rejected', providerId: this.id, jobId, status: res.status })
      })
      .catch((err) => log.warn({ msg: 'Remote job cancel failed', providerId: this.id, jobId, error: errorMessage(err) }))
  }

  private headers(json = false): Record<string, string> {
    return {
      ...(json ? { 'Content-Type': 'application/json' } : {}),
      ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
    }
  }
}
