import { z } from 'zod'
import { TASK_PRIORITIES, TASK_STATES, TASK_TYPES } from './Task'

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((v) => v.startsWith('https://') || v.startsWith('http://'), 'must be an http(s) URL')

export const imageGenerationInput = z.object({
  prompt: z.string().trim().min(1).max(4000),
  negativePrompt: z.string().max(2000).optional(),
  size: z.enum(['256x256', '512x512', '1024x1024', '1792x1024', '1024x1792']).default('1024x1024'),
  count: z.number().int().min(1).max(4).default(1),
  style: z.string().max(100).optional(),
  seed: z.number().int().optional(),
})

export const videoGenerationInput = z.object({
  prompt: z.string().trim().min(1).max(4000),
  durationSec: z.number().min(1).max(60).default(5),
  fps: z.number().int().min(12).max(60).default(24),
  resolution: z.enum(['720p', '1080p', '4k']).default('1080p'),
  aspectRatio: z.enum(['16:9', '9:16', '1:1', '4:3']).default('16:9'),
  imageUrl: httpUrl.optional(),
})

export const audioTranscriptionInput = z.object({
  audioUrl: httpUrl,
  language: z.string().trim().min(2).max(10).optional(),
  prompt: z.string().max(1500).optional(),
  format: z.enum(['text', 'json', 'srt', 'vtt']).default('json'),
})

export const subtitleGenerationInput = z.object({
  mediaUrl: httpUrl,
  language: z.string().trim().min(2).max(10).optional(),
  format: z.enum(['srt', 'vtt']).default('srt'),
})

export type AudioTranscriptionInput = z.infer<typeof audioTranscriptionInput>
export type SubtitleGenerationInput = z.infer<typeof subtitleGenerationInput>

const commonFields = {
  priority: z.enum(TASK_PRIORITIES).default('medium'),
  webhookUrl: httpUrl.optional(),
  webhookSecret: z.string().min(1).max(256).optional(),
  metadata: z.record(z.unknown()).default({}),
  maxRetries: z.number().int().min(0).max(10).optional(),
  preferredProvider: z.string().trim().min(1).max(100).optional(),
  timeoutMs: z.number().int().min(1000).max(60 * 60 * 1000).optional(),
}

export const createTaskRequest = z.discriminatedUnion('type', [
  z.object({ type: z.literal('image_generation'), input: imageGenerationInput, ...commonFields }),
  z.object({ type: z.literal('video_generation'), input: videoGenerationInput, ...commonFields }),
  z.object({ type: z.literal('audio_transcription'), input: audioTranscriptionInput, ...commonFields }),
  z.object({ type: z.literal('subtitle_generation'), input: subtitleGenerationInput, ...commonFields }),
])

export type CreateTaskRequest = z.infer<typeof createTaskRequest>

export const batchRequest = z.object({
  requests: z.array(z.unknown()).min(1),
})

export const listTasksQuery = z.object({
  status: z
    .string()
    .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(z.enum(TASK_STATES)))
    .optional(),
  type: z.enum(TASK_TYPES).optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
  provider: z.string().trim().min(1).optional(),
  batchId: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
})

export type ListTasksQuery = z.infer<typeof listTasksQuery>

/** Flatten zod issues into `path: message` strings for error details. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}
