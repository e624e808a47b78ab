import { describe, expect, test } from 'vitest'
import { loadConfig, requireEnv } from './config'

describe('requireEnv', () => {
  test('returns value when env var exists', () => {
    expect(requireEnv('TEST_VAR', { TEST_VAR: 'hello' })).toBe('hello')
  })

  test('throws when env var is missing', () => {
    expect(() => requireEnv('NONEXISTENT_VAR', {})).toThrow('Missing required environment variable: NONEXISTENT_VAR')
  })

  test('throws when env var is empty string', () => {
    expect(() => requireEnv('EMPTY_VAR', { EMPTY_VAR: '' })).toThrow('Missing required environment variable: EMPTY_VAR')
  })
})

describe('loadConfig', () => {
  const secret = 'test-secret-test-secret'

  test('applies defaults', () => {
    expect(loadConfig({ JWT_SECRET: secret })).toEqual({
      port: 3001,
      databasePoolMax: 10,
      jwtSecret: secret,
      accessTokenTtlSeconds: 1800,
      bookMutationPolicy: 'authenticated',
      anthropicApiKey: undefined,
      anthropicModel: 'claude-sonnet-4-5-20250929',
      llmTimeoutMs: 30000,
      llmMaxRetries: 2,
      corsOrigins: [],
      logLevel: 'info',
    })
  })

  test('reads overrides', () => {
    const config = loadConfig({
      JWT_SECRET: secret,
      PORT: '8080',
      ACCESS_TOKEN_TTL_MINUTES: '5',
      BOOK_MUTATION_POLICY: 'admin',
      ANTHROPIC_API_KEY: 'test-key',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
      LOG_LEVEL: 'debug',
    })
    expect(config.port).toBe(8080)
    expect(config.accessTokenTtlSeconds).toBe(300)
    expect(config.bookMutationPolicy).toBe('admin')
    expect(config.anthropicApiKey).toBe('test-key')
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test'])
    expect(config.logLevel).toBe('debug')
  })

  test('empty API key counts as unset', () => {
    expect(loadConfig({ JWT_SECRET: secret, ANTHROPIC_API_KEY: '' }).anthropicApiKey).toBeUndefined()
  })

  test('missing JWT_SECRET fails', () => {
    expect(() => loadConfig({})).toThrow('JWT_SECRET is required')
  })

  test('short or placeholder secrets fail', () => {
    expect(() => loadConfig({ JWT_SECRET: 'short' })).toThrow('at least 16 characters')
    expect(() => loadConfig({ JWT_SECRET: 'change-me' })).toThrow('at least 16 characters')
  })

  test('unknown mutation policy fails', () => {
    expect(() => loadConfig({ JWT_SECRET: secret, BOOK_MUTATION_POLICY: 'anyone' })).toThrow('BOOK_MUTATION_POLICY')
  })
})
