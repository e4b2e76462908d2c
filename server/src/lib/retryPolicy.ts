/**
 * One backoff policy shared by the dispatcher (task retries) and the webhook notifier (delivery retries).
 * Delay for attempt n (1-based count of attempts already made) is min(maxDelay, base * 2^(n-1)),
 * plus up to `jitter` of that value added at random.
 */
export interface RetryPolicyOptions {
  /** Total attempts allowed, including the first. */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  /** Fraction in [0, 1) of the computed delay added as random jitter. */
  jitter?: number
  /** Stop retrying once this much time has passed since the first attempt. */
  maxElapsedMs?: number
  isRetryable?: (error: unknown) => boolean
  random?: () => number
}

export interface RetryDecision {
  retry: boolean
  delayMs: number
}

export class RetryPolicy {
  readonly maxAttempts: number
  readonly baseDelayMs: number
  readonly maxDelayMs: number
  readonly jitter: number
  readonly maxElapsedMs: number | undefined
  private readonly isRetryable: (error: unknown) => boolean
  private readonly random: () => number

  constructor(private readonly options: RetryPolicyOptions) {
    if (options.maxAttempts < 1) throw new RangeError('maxAttempts must be at least 1')
    this.maxAttempts = options.maxAttempts
    this.baseDelayMs = Math.max(0, options.baseDelayMs)
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs)
    this.jitter = Math.min(0.99, Math.max(0, options.jitter ?? 0))
    this.maxElapsedMs = options.maxElapsedMs
    this.isRetryable = options.isRetryable ?? (() => true)
    this.random = options.random ?? Math.random
  }

  /** Same backoff with a different attempt budget (per-task retry limits). */
  withMaxAttempts(maxAttempts: number): RetryPolicy {
    return new RetryPolicy({ ...this.options, maxAttempts })
  }

  /** Delay before the next attempt, given how many attempts were already made. */
  delayFor(attemptsMade: number): number {
    const exponent = Math.max(0, attemptsMade - 1)
    const raw = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** exponent)
    if (this.jitter === 0) return raw
    return Math.round(raw + raw * this.jitter * this.random())
  }

  /**
   * Whether to try again after a failed attempt.
   * `firstAttemptAt` and `now` are epoch ms; the elapsed-time cap applies to when the next attempt would run.
   */
  decide(attemptsMade: number, error: unknown, firstAttemptAt?: number, now = Date.now()): RetryDecision {
    if (attemptsMade >= this.maxAttempts) return { retry: false, delayMs: 0 }
    if (!this.isRetryable(error)) return { retry: false, delayMs: 0 }
    const delayMs = this.delayFor(attemptsMade)
    if (this.maxElapsedMs !== undefined && firstAttemptAt !== undefined) {
      if (now + delayMs - firstAttemptAt > this.maxElapsedMs) return { retry: false, delayMs: 0 }
    }
    return { retry: true, delayMs }
  }
}
