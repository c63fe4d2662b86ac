import path from 'path'
import { z } from 'zod'

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  CHAT_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  CHAT_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  CHAT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),
  CHAT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  UPLOADS_DIR: z.string().min(1).default('uploads'),
  DATABASE_PATH: z.string().min(1).default('data/files.db'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
})

export interface AppConfig {
  anthropicApiKey?: string
  chatModel: string
  chatMaxTokens: number
  chatTemperature: number
  chatTimeoutMs: number
  uploadsDir: string
  databasePath: string
  maxUploadBytes: number
}

export function loadConfig(env: Record<string, string | undefined> = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new Error(`Invalid configuration: ${issue.path.join('.')} ${issue.message}`)
  }

  const e = parsed.data
  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    chatModel: e.CHAT_MODEL,
    chatMaxTokens: e.CHAT_MAX_TOKENS,
    chatTemperature: e.CHAT_TEMPERATURE,
    chatTimeoutMs: e.CHAT_TIMEOUT_MS,
    uploadsDir: path.resolve(cwd, e.UPLOADS_DIR),
    databasePath: e.DATABASE_PATH === ':memory:' ? e.DATABASE_PATH : path.resolve(cwd, e.DATABASE_PATH),
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
  }
}

let config: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig()
  }
  return config
}
