import { z } from 'zod'
import { ConfigError } from './errors.js'

export const DEFAULT_ASR_URL = 'wss://openspeech.bytedance.com/api/v3/sauc/bigmodel'
export const DEFAULT_RESOURCE_ID = 'volc.bigasr.sauc.duration'

const asrSchema = z.object({
  url: z.string().url().default(DEFAULT_ASR_URL),
  appKey: z.string().default(''),
  accessKey: z.string().default(''),
  resourceId: z.string().min(1).default(DEFAULT_RESOURCE_ID),
  modelName: z.string().min(1).default('bigmodel'),
  uid: z.string().min(1).default('voice_input_user'),
  enablePunctuation: z.boolean().default(true),
  enableItn: z.boolean().default(true)
})

const audioSchema = z.object({
  sampleRate: z.literal(16000).default(16000),
  bitsPerSample: z.literal(16).default(16),
  channels: z.literal(1).default(1),
  chunkDurationMs: z.number().int().positive().default(200),
  vadWindowMs: z.union([z.literal(10), z.literal(20), z.literal(30)]).default(30),
  vadThresholdDb: z.number().max(0).default(-45)
})

const recordingSchema = z.object({
  /** 0 disables the limit */
  maxDurationMs: z.number().int().nonnegative().default(60_000),
  /** 0 disables silence detection */
  silenceTimeoutMs: z.number().int().nonnegative().default(3_000)
})

const sessionSchema = z.object({
  maxBufferChunks: z.number().int().positive().default(60),
  pollIntervalMs: z.number().int().positive().default(50),
  receiveTimeoutMs: z.number().int().positive().default(1_000),
  stopGraceMs: z.number().int().positive().default(12_000),
  stopWaitTimeoutMs: z.number().int().positive().default(10_000),
  forceCloseWaitMs: z.number().int().positive().default(2_000),
  handshakeTimeoutMs: z.number().int().positive().default(5_000)
})

export const dictationConfigSchema = z.object({
  asr: asrSchema.default({}),
  audio: audioSchema.default({}),
  recording: recordingSchema.default({}),
  session: sessionSchema.default({}),
  verbose: z.boolean().default(false)
})

export type DictationConfig = z.infer<typeof dictationConfigSchema>
export type DictationConfigInput = z.input<typeof dictationConfigSchema>

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') {
    return undefined
  }
  return Number(raw)
}

function envBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') {
    return undefined
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}

function compact(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined))
}

/**
 * Load configuration: defaults, then environment variables, then explicit overrides
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(
  overrides: DictationConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): DictationConfig {
  const fromEnv = {
    asr: compact({
      url: env.VOLC_ASR_URL || undefined,
      appKey: env.VOLC_ASR_APP_KEY,
      accessKey: env.VOLC_ASR_ACCESS_KEY,
      resourceId: env.VOLC_ASR_RESOURCE_ID || undefined
    }),
    recording: compact({
      maxDurationMs: envNumber(env, 'DICTATION_MAX_DURATION_MS'),
      silenceTimeoutMs: envNumber(env, 'DICTATION_SILENCE_TIMEOUT_MS')
    }),
    verbose: envBoolean(env, 'DICTATION_VERBOSE')
  }

  const merged = {
    ...overrides,
    asr: { ...fromEnv.asr, ...overrides.asr },
    recording: { ...fromEnv.recording, ...overrides.recording },
    verbose: overrides.verbose ?? fromEnv.verbose
  }

  const parsed = dictationConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid dictation config: ${issues.join('; ')}`, issues)
  }
  return parsed.data
}

/**
 * Credentials must be present before a streaming session can connect
 * @throws ConfigError when either key is missing
 */
export function assertCredentials(config: DictationConfig): void {
  const missing: string[] = []
  if (!config.asr.appKey) missing.push('asr.appKey (VOLC_ASR_APP_KEY)')
  if (!config.asr.accessKey) missing.push('asr.accessKey (VOLC_ASR_ACCESS_KEY)')
  if (missing.length > 0) {
    throw new ConfigError(`Missing ASR credentials: ${missing.join(', ')}`, missing)
  }
}
