import type { AppConfig } from '../config'
import type { MediaProvider, ProviderOptions } from '../models/Provider'
import { HttpJobProvider } from './httpJobProvider'
import { OpenAIProvider } from './openai'
import { SimulatedProvider } from './simulated'

export interface ProviderRegistration {
  provider: MediaProvider
  options: ProviderOptions
}

/** Bindings enabled by configuration, in registration order. */
export function buildProviders(config: AppConfig['providers']): ProviderRegistration[] {
  const out: ProviderRegistration[] = []

  if (config.openaiApiKey) {
    out.push({
      provider: new OpenAIProvider({ apiKey: config.openaiApiKey }),
      options: { costPerUnit: 0.04, maxConcurrent: 5, ratePerSecond: 1, burst: 5 },
    })
  }

  for (const http of config.http) {
    out.push({
      provider: new HttpJobProvider({
        id: http.id,
        baseUrl: http.baseUrl,
        apiKey: http.apiKey,
        mediaTypes: http.mediaTypes,
        pollIntervalMs: http.pollIntervalMs,
      }),
      options: {
        costPerUnit: http.costPerUnit,
        ratePerSecond: http.ratePerSecond,
        burst: http.burst,
        maxConcurrent: http.maxConcurrent,
      },
    })
  }

  if (config.simulated) {
    out.push(
      {
        provider: new SimulatedProvider({
          id: 'simulated-fast',
          mediaTypes: ['image_generation', 'audio_transcription', 'subtitle_generation'],
          stepDelayMs: 300,
          failureRate: 0.1,
        }),
        options: { costPerUnit: 0.01, maxConcurrent: 4, ratePerSecond: 5 },
      },
      {
        provider: new SimulatedProvider({
          id: 'simulated-studio',
          mediaTypes: ['image_generation', 'video_generation', 'subtitle_generation'],
          stepDelayMs: 1000,
          failureRate: 0.05,
          costPerRun: 0.5,
        }),
        options: { costPerUnit: 0.5, maxConcurrent: 2, ratePerSecond: 1, burst: 2 },
      }
    )
  }

  return out
}
