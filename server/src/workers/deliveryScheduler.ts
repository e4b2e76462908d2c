/**
 * When a webhook delivery attempt runs. In-process timers by default; a Bull delayed queue when Redis
 * is configured, so pending retries survive a restart. Any process consuming the queue may run an
 * attempt; the notifier reads the next head from the repository after each one.
 */
import Queue from 'bull'
import { getLogger } from '../lib/logger'
import { redisClientFactory } from '../utils/redis'

const log = getLogger('webhook')

export type DeliveryHandler = (deliveryId: string) => Promise<void>

export interface DeliveryScheduler {
  /** Register the attempt handler; call once before scheduling. */
  start(handler: DeliveryHandler): void
  schedule(deliveryId: string, delayMs: number): Promise<void>
  close(): Promise<void>
}

export class TimerDeliveryScheduler implements DeliveryScheduler {
  private handler: DeliveryHandler | null = null
  private readonly timers = new Map<string, NodeJS.Timeout>()
  private readonly running = new Set<Promise<void>>()
  private closed = false

  start(handler: DeliveryHandler): void {
    this.handler = handler
  }

  async schedule(deliveryId: string, delayMs: number): Promise<void> {
    if (this.closed) return
    const existing = this.timers.get(deliveryId)
    if (existing) clearTimeout(existing)
    const timer = setTimeout(() => {
      this.timers.delete(deliveryId)
      this.run(deliveryId)
    }, Math.max(0, delayMs))
    timer.unref()
    this.timers.set(deliveryId, timer)
  }

  async close(): Promise<void> {
    this.closed = true
    for (const timer of this.timers.values()) clearTimeout(timer)
    this.timers.clear()
    await Promise.all(this.running)
  }

  private run(deliveryId: string): void {
    const handler = this.handler
    if (!handler) {
      log.error({ msg: 'Delivery fired before a handler was registered', deliveryId })
      return
    }
    const attempt = handler(deliveryId)
      .catch((err) => log.error({ msg: 'Delivery handler failed', deliveryId, err }))
      .finally(() => this.running.delete(attempt))
    this.running.add(attempt)
  }
}

interface DeliveryJob {
  deliveryId: string
}

export class BullDeliveryScheduler implements DeliveryScheduler {
  private readonly queue: Queue.Queue<DeliveryJob>

  constructor(redisUrl: string, private readonly concurrency = 10) {
    this.queue = new Queue<DeliveryJob>('webhook-delivery', { createClient: redisClientFactory(redisUrl) })
    this.queue.on('error', (err) => log.error({ msg: 'Webhook queue error', err }))
  }

  start(handler: DeliveryHandler): void {
    this.queue
      .process(this.concurrency, async (job: Queue.Job<DeliveryJob>) => {
        await handler(job.data.deliveryId)
      })
      .catch((err) => log.error({ msg: 'Webhook queue processor stopped', err }))
  }

  async schedule(deliveryId: string, delayMs: number): Promise<void> {
    await this.queue.add(
      { deliveryId },
      { delay: Math.max(0, delayMs), attempts: 1, removeOnComplete: true, removeOnFail: 100 }
    )
  }

  async close(): Promise<void> {
    await this.queue.close()
  }
}
