/**
 * Wires the orchestrator's components for one process. The HTTP server, the tests and any embedding
 * host build it the same way and differ only in the repositories, providers and clocks they pass in.
 */
import type { AppConfig } from '../config'
import type { Repositories } from '../store/repositories'
import { TaskStore } from '../store/TaskStore'
import { ProgressChannel } from '../store/progressChannel'
import { ProviderLimiter } from '../providers/limiter'
import { ProviderRegistry } from '../providers/registry'
import type { ProviderRegistration } from '../providers'
import { RetryPolicy } from '../lib/retryPolicy'
import type { ContentFilter } from '../workers/dispatcher'
import { Dispatcher } from '../workers/dispatcher'
import { Scheduler } from '../workers/scheduler'
import type { DeliveryScheduler } from '../workers/deliveryScheduler'
import { BullDeliveryScheduler, TimerDeliveryScheduler } from '../workers/deliveryScheduler'
import { WebhookNotifier } from '../workers/webhookNotifier'
import { TaskService } from './taskService'
import { BatchCoordinator } from './batchCoordinator'
import { startTaskCleanup } from './maintenance'
import { getLogger } from '../lib/logger'

const log = getLogger('worker')

export interface OrchestratorDeps {
  repositories: Repositories
  providers: ProviderRegistration[]
  /** Defaults to a Bull queue when config.redisUrl is set, in-process timers otherwise. */
  deliveryScheduler?: DeliveryScheduler
  contentFilter?: ContentFilter
  fetchImpl?: typeof fetch
  now?: () => number
  random?: () => number
}

export interface Orchestrator {
  config: AppConfig
  repositories: Repositories
  store: TaskStore
  registry: ProviderRegistry
  limiter: ProviderLimiter
  scheduler: Scheduler
  dispatcher: Dispatcher
  notifier: WebhookNotifier
  tasks: TaskService
  batches: BatchCoordinator
  addProvider(registration: ProviderRegistration): void
  removeProvider(providerId: string): boolean
  /** Restore persisted work, resume webhooks and start the loops. */
  start(): Promise<void>
  stop(): Promise<void>
}

export function createOrchestrator(config: AppConfig, deps: OrchestratorDeps): Orchestrator {
  const { repositories, now } = deps
  const store = new TaskStore(repositories.tasks, { now })
  const limiter = new ProviderLimiter({ now })
  const registry = new ProviderRegistry({
    failureThreshold: config.registry.failureThreshold,
    cooldownMs: config.registry.cooldownMs,
    emaAlpha: config.registry.emaAlpha,
    latencyRefMs: config.registry.latencyRefMs,
    weights: config.registry.weights,
    probeTimeoutMs: config.registry.probeTimeoutMs,
    now,
    load: (providerId) => limiter.load(providerId),
  })

  const dispatcher = new Dispatcher({
    store,
    registry,
    limiter,
    progress: new ProgressChannel(store),
    retryPolicy: new RetryPolicy({
      maxAttempts: config.dispatch.defaultMaxRetries + 1,
      baseDelayMs: config.dispatch.retryBaseDelayMs,
      maxDelayMs: config.dispatch.retryMaxDelayMs,
      jitter: config.dispatch.retryJitter,
      random: deps.random,
    }),
    timeoutsMs: config.dispatch.timeoutsMs,
    contentFilter: deps.contentFilter,
    now,
  })
  const scheduler = new Scheduler({ store, dispatcher, limiter, config: config.scheduler, now })

  const notifier = new WebhookNotifier({
    deliveries: repositories.deliveries,
    store,
    scheduler:
      deps.deliveryScheduler ??
      (config.redisUrl ? new BullDeliveryScheduler(config.redisUrl) : new TimerDeliveryScheduler()),
    retryPolicy: new RetryPolicy({
      maxAttempts: config.webhook.maxAttempts,
      baseDelayMs: config.webhook.baseDelayMs,
      maxDelayMs: config.webhook.maxDelayMs,
      maxElapsedMs: config.webhook.maxElapsedMs,
      jitter: config.webhook.jitter,
      random: deps.random,
    }),
    requestTimeoutMs: config.webhook.requestTimeoutMs,
    defaultSecret: config.webhook.defaultSecret,
    progressEventStep: config.webhook.progressEventStep,
    fetchImpl: deps.fetchImpl,
    now,
  })

  const tasks = new TaskService({
    store,
    scheduler,
    notifier,
    defaultMaxRetries: config.dispatch.defaultMaxRetries,
    retryResetsAttempts: config.retryResetsAttempts,
    now,
  })
  const batches = new BatchCoordinator({
    batches: repositories.batches,
    store,
    tasks,
    maxBatchSize: config.maxBatchSize,
    now,
  })

  const addProvider = ({ provider, options }: ProviderRegistration) => {
    registry.register(provider, options)
    limiter.configure(provider.id, options)
  }
  deps.providers.forEach(addProvider)

  const stoppers: (() => void)[] = []

  return {
    config,
    repositories,
    store,
    registry,
    limiter,
    scheduler,
    dispatcher,
    notifier,
    tasks,
    batches,
    addProvider,
    removeProvider(providerId) {
      limiter.remove(providerId)
      return registry.unregister(providerId)
    },
    async start() {
      notifier.start()
      await notifier.resume()
      await scheduler.restore()
      scheduler.start()
      stoppers.push(registry.startHealthProbes(config.registry.healthProbeIntervalMs))
      stoppers.push(startTaskCleanup(tasks, config.retentionMs, config.cleanupIntervalMs))
      log.info({ msg: 'Orchestrator started', providers: registry.snapshot().map((p) => p.id) })
    },
    async stop() {
      for (const stop of stoppers.splice(0)) stop()
      await scheduler.stop()
      await notifier.stop()
      log.info({ msg: 'Orchestrator stopped' })
    },
  }
}
