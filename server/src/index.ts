import './env'
import { initSentry } from './lib/sentry'

initSentry()
import { loadConfig } from './config'
import { openRepositories } from './db'
import { buildProviders } from './providers'
import { createOrchestrator } from './services/orchestrator'
import { createApp } from './app'
import { parseApiKeys } from './utils/apiKey'
import { getLogger } from './lib/logger'

const log = getLogger('api')

async function main(): Promise<void> {
  const config = loadConfig()
  const repositories = await openRepositories(config.databaseUrl)
  const providers = buildProviders(config.providers)
  if (providers.length === 0) {
    log.warn({ msg: 'No providers configured; tasks will wait and then fail with NO_PROVIDER_AVAILABLE' })
  }

  const orchestrator = createOrchestrator(config, { repositories, providers })
  await orchestrator.start()

  const apiKeys = parseApiKeys()
  if (apiKeys.size === 0) log.warn({ msg: 'API_KEY/API_KEYS not set; /api is open' })
  const app = createApp(orchestrator, {
    apiKeys,
    corsOrigins: (process.env.CORS_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),
  })
  const server = app.listen(config.port, () => {
    log.info({ msg: 'Server listening', port: config.port })
  })

  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ msg: 'Shutting down', signal })
    server.close()
    orchestrator
      .stop()
      .then(() => repositories.close?.())
      .then(() => process.exit(0))
      .catch((err) => {
        log.error({ msg: 'Shutdown failed', err })
        process.exit(1)
      })
  }
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

main().catch((err) => {
  log.fatal({ msg: 'Startup failed', err })
  process.exit(1)
})
