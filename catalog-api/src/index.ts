import Anthropic from '@anthropic-ai/sdk'
import { serve } from '@hono/node-server'
import { createApp, createServices } from './app'
import { createTokenService } from './auth/tokens'
import { loadConfig, requireEnv } from './config'
import {
  connect,
  createPostgresCatalogStore,
  createPostgresCredentialStore,
  ensureSchema,
} from './db/postgres'
import { errorMessage, log, logger, setLogLevel } from './logger'
import { createAnthropicModel, createLlmGateway } from './services/llm'

const config = loadConfig()
setLogLevel(config.logLevel)

const sql = connect(requireEnv('DATABASE_URL'), { max: config.databasePoolMax })
await ensureSchema(sql)

// Without a key the API still serves everything except LLM-backed routes
const model = config.anthropicApiKey
  ? createAnthropicModel(
      new Anthropic({
        apiKey: config.anthropicApiKey,
        timeout: config.llmTimeoutMs,
        maxRetries: config.llmMaxRetries,
      }),
      config.anthropicModel,
    )
  : null
if (!model) {
  logger.warn('startup.llm_disabled', { message: 'ANTHROPIC_API_KEY not set' })
}

const tokens = createTokenService({
  secret: config.jwtSecret,
  ttlSeconds: config.accessTokenTtlSeconds,
})
const credentials = createPostgresCredentialStore(sql)
const catalog = createPostgresCatalogStore(sql)
const gateway = createLlmGateway({ model, timeoutMs: config.llmTimeoutMs })

const app = createApp({
  services: createServices({ credentials, catalog, tokens, gateway }),
  tokens,
  credentials,
  gateway,
  bookMutationPolicy: config.bookMutationPolicy,
  corsOrigins: config.corsOrigins,
})

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log('startup', { port: info.port, book_mutation_policy: config.bookMutationPolicy })
})

let shuttingDown = false

async function shutdown(signal: string) {
  if (shuttingDown) return
  shuttingDown = true
  log('shutdown', { signal })
  await new Promise<void>((resolve) => server.close(() => resolve()))
  await sql.end({ timeout: 5 })
  process.exit(0)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      logger.error('shutdown.failed', { message: errorMessage(err) })
      process.exit(1)
    })
  })
}
