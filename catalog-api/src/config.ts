import { z } from 'zod'
import { BOOK_MUTATION_POLICIES, type BookMutationPolicy } from './types'
import type { LogLevel } from './logger'

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name]
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`)
  }
  return value
}

// Empty strings in .env files mean "not set"
const optionalString = z.preprocess(
  (val) => (typeof val === 'string' && val.trim() === '' ? undefined : val),
  z.string().optional(),
)

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET is required' })
    .min(16, 'JWT_SECRET must be at least 16 characters')
    .refine((s) => s !== 'change-me', 'JWT_SECRET must be set to a real secret (run: openssl rand -base64 32)'),
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(30),
  BOOK_MUTATION_POLICY: z.enum(BOOK_MUTATION_POLICIES).default('authenticated'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  CORS_ORIGINS: optionalString,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
})

export interface Config {
  port: number
  databasePoolMax: number
  jwtSecret: string
  accessTokenTtlSeconds: number
  bookMutationPolicy: BookMutationPolicy
  anthropicApiKey: string | undefined
  anthropicModel: string
  llmTimeoutMs: number
  llmMaxRetries: number
  corsOrigins: string[]
  logLevel: LogLevel
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    )
    throw new Error(`Invalid configuration: ${issues.join('; ')}`)
  }
  const e = parsed.data
  return {
    port: e.PORT,
    databasePoolMax: e.DATABASE_POOL_MAX,
    jwtSecret: e.JWT_SECRET,
    accessTokenTtlSeconds: e.ACCESS_TOKEN_TTL_MINUTES * 60,
    bookMutationPolicy: e.BOOK_MUTATION_POLICY,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    anthropicModel: e.ANTHROPIC_MODEL,
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    llmMaxRetries: e.LLM_MAX_RETRIES,
    corsOrigins: e.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) ?? [],
    logLevel: e.LOG_LEVEL,
  }
}
