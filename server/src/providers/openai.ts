import OpenAI, { toFile } from 'openai'
import type { TaskType } from '../models/Task'
import type { GenerateContext, GenerateResult, HealthStatus, MediaProvider } from '../models/Provider'
import type { AudioTranscriptionInput, SubtitleGenerationInput } from '../models/schemas'
import { audioTranscriptionInput, describeIssues, imageGenerationInput, subtitleGenerationInput } from '../models/schemas'
import { PermanentProviderError, TransientProviderError } from '../lib/errors'

export interface OpenAIProviderOptions {
  apiKey: string
  id?: string
  imageModel?: string
  transcriptionModel?: string
  /** Injected client (tests, custom base URL). */
  client?: OpenAI
}

const MEDIA_TYPES: readonly TaskType[] = ['image_generation', 'audio_transcription', 'subtitle_generation']

/** Largest upload the transcription endpoint takes. */
const MAX_AUDIO_BYTES = 25 * 1024 * 1024

/** Image generation and Whisper transcription/subtitles through the OpenAI SDK. */
export class OpenAIProvider implements MediaProvider {
  readonly id: string
  readonly mediaTypes = MEDIA_TYPES
  private readonly client: OpenAI
  private readonly imageModel: string
  private readonly transcriptionModel: string

  constructor(options: OpenAIProviderOptions) {
    this.id = options.id ?? 'openai'
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 })
    this.imageModel = options.imageModel ?? 'dall-e-3'
    this.transcriptionModel = options.transcriptionModel ?? 'whisper-1'
  }

  async generate(input: Record<string, unknown>, ctx: GenerateContext): Promise<GenerateResult> {
    switch (ctx.type) {
      case 'image_generation':
        return this.generateImage(input, ctx)
      case 'subtitle_generation': {
        const parsed = subtitleGenerationInput.safeParse(input)
        if (!parsed.success) return invalid(describeIssues(parsed.error))
        return this.transcribe(parsed.data.mediaUrl, parsed.data, parsed.data.format, ctx)
      }
      case 'audio_transcription': {
        const parsed = audioTranscriptionInput.safeParse(input)
        if (!parsed.success) return invalid(describeIssues(parsed.error))
        return this.transcribe(parsed.data.audioUrl, parsed.data, parsed.data.format, ctx)
      }
      default:
        return { ok: false, error: new PermanentProviderError(`${this.id} does not handle ${ctx.type}`) }
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      await this.client.models.retrieve(this.transcriptionModel)
      return 'healthy'
    } catch (err) {
      if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) return 'unavailable'
      return 'degraded'
    }
  }

  async getCredits(): Promise<number | null> {
    // The API exposes no balance; quota exhaustion surfaces as insufficient_quota on a call
    return null
  }

  private async generateImage(input: Record<string, unknown>, ctx: GenerateContext): Promise<GenerateResult> {
    const parsed = imageGenerationInput.safeParse(input)
    if (!parsed.success) return invalid(describeIssues(parsed.error))
    const { prompt, negativePrompt, size, count, style } = parsed.data

    ctx.reportProgress(0.1)
    const fullPrompt = [prompt, style ? `Style: ${style}` : '', negativePrompt ? `Avoid: ${negativePrompt}` : '']
      .filter(Boolean)
      .join('\n')
    const response = await this.client.images.generate(
      { model: this.imageModel, prompt: fullPrompt, size, n: count, response_format: 'url' },
      { signal: ctx.signal }
    )
    const images = (response.data ?? []).map((img) => ({
      url: img.url,
      revisedPrompt: img.revised_prompt,
    }))
    if (images.length === 0) {
      return { ok: false, error: new TransientProviderError('server_error', 'Image generation returned no images') }
    }
    ctx.reportProgress(1)
    return { ok: true, output: { provider: this.id, model: this.imageModel, images } }
  }

  private async transcribe(
    mediaUrl: string,
    options: Pick<AudioTranscriptionInput | SubtitleGenerationInput, 'language'> & { prompt?: string },
    format: AudioTranscriptionInput['format'],
    ctx: GenerateContext
  ): Promise<GenerateResult> {
    ctx.reportProgress(0.05)
    const media = await fetch(mediaUrl, { signal: ctx.signal })
    if (!media.ok) {
      const message = `Fetching media returned ${media.status}`
      if (media.status >= 500) return { ok: false, error: new TransientProviderError('server_error', message) }
      return { ok: false, error: new PermanentProviderError(message) }
    }
    const declared = Number(media.headers.get('content-length') ?? '0')
    if (declared > MAX_AUDIO_BYTES) {
      return { ok: false, error: new PermanentProviderError(`Media is ${declared} bytes; limit is ${MAX_AUDIO_BYTES}`) }
    }
    const file = await toFile(media, fileNameFromUrl(mediaUrl))
    ctx.reportProgress(0.3)

    const result: unknown = await this.client.audio.transcriptions.create(
      {
        file,
        model: this.transcriptionModel,
        response_format: format === 'json' ? 'verbose_json' : format,
        language: options.language || undefined,
        prompt: options.prompt?.trim().slice(0, 1500) || undefined,
      },
      { signal: ctx.signal }
    )
    ctx.reportProgress(1)

    if (typeof result === 'string') {
      return { ok: true, output: { provider: this.id, format, content: result } }
    }
    if (typeof result === 'object' && result !== null) {
      const text: unknown = Reflect.get(result, 'text')
      const segments: unknown = Reflect.get(result, 'segments')
      const language: unknown = Reflect.get(result, 'language')
      return {
        ok: true,
        output: {
          provider: this.id,
          format,
          text: typeof text === 'string' ? text : '',
          ...(Array.isArray(segments) ? { segments } : {}),
          ...(typeof language === 'string' ? { language } : {}),
        },
      }
    }
    return { ok: false, error: new TransientProviderError('server_error', 'Transcription returned an empty response') }
  }
}

function invalid(issues: string[]): GenerateResult {
  return {
    ok: false,
    error: new PermanentProviderError(`Invalid input: ${issues.join('; ')}`, 'VALIDATION_FAILED'),
  }
}

function fileNameFromUrl(url: string): string {
  try {
    const last = new URL(url).pathname.split('/').filter(Boolean).pop()
    return last && /\.[a-z0-9]{2,4}$/i.test(last) ? last : 'media.mp3'
  } catch {
    return 'media.mp3'
  }
}
