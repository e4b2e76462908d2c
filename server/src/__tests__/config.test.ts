import { describe, it, expect } from 'vitest'
import { loadConfig } from '../config'
import { parseApiKeys } from '../utils/apiKey'

describe('loadConfig', () => {
  it('should fall back to defaults for missing or unusable values', () => {
    const config = loadConfig({ NODE_ENV: 'production', WORKER_CONCURRENCY: '0', MAX_RETRIES: 'many' })

    expect(config.port).toBe(3001)
    expect(config.scheduler.workerConcurrency).toBe(16)
    expect(config.dispatch.defaultMaxRetries).toBe(3)
    expect(config.webhook).toMatchObject({ maxAttempts: 5, baseDelayMs: 30_000, progressEventStep: 0.25 })
    expect(config.registry.weights).toEqual({ success: 0.5, latency: 0.2, cost: 0.15, load: 0.15 })
    expect(config.providers).toEqual({ openaiApiKey: undefined, simulated: false, http: [] })
    expect(config.retryResetsAttempts).toBe(true)
  })

  it('should enable simulated providers outside production unless disabled', () => {
    expect(loadConfig({}).providers.simulated).toBe(true)
    expect(loadConfig({ ENABLE_SIMULATED_PROVIDERS: 'no' }).providers.simulated).toBe(false)
  })

  it('should parse HTTP provider bindings', () => {
    const config = loadConfig({
      HTTP_PROVIDERS: '[{"id":"studio","baseUrl":"https://studio.test","mediaTypes":["video_generation"],"ratePerSecond":2}]',
    })

    expect(config.providers.http).toEqual([
      { id: 'studio', baseUrl: 'https://studio.test', mediaTypes: ['video_generation'], ratePerSecond: 2 },
    ])
  })

  it('should reject malformed HTTP provider bindings', () => {
    expect(() => loadConfig({ HTTP_PROVIDERS: '[{' })).toThrow(/^HTTP_PROVIDERS is not valid JSON/)
    expect(() => loadConfig({ HTTP_PROVIDERS: '[{"id":"x","baseUrl":"https://x.test","mediaTypes":["music"]}]' })).toThrow(
      /^HTTP_PROVIDERS is invalid: 0\.mediaTypes\.0 /
    )
  })
})

describe('parseApiKeys', () => {
  it('should read the single key and the key:user list', () => {
    const keys = parseApiKeys({ API_KEY: ' test-single ', API_KEYS: 'test-a:alice, test-b:bob,broken' })

    expect([...keys.entries()]).toEqual([
      ['test-single', 'api-user'],
      ['test-a', 'alice'],
      ['test-b', 'bob'],
    ])
  })
})
