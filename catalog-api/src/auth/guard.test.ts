import { describe, expect, test } from 'vitest'
import { Hono } from 'hono'
import { MemoryCredentialStore } from '../__tests__/helpers/memory-store'
import { TEST_SECRET } from '../__tests__/helpers/context'
import type { User } from '../types'
import {
  bearerToken,
  createRequireAuth,
  requireRole,
  requireRoleMiddleware,
  resolveCurrentUser,
  type AppEnv,
} from './guard'
import { createTokenService } from './tokens'

async function setup() {
  const users = new MemoryCredentialStore()
  const tokens = createTokenService({ secret: TEST_SECRET })
  const created = await users.createUser({
    username: 'reader',
    email: 'reader@example.com',
    passwordHash: 'salt:key',
    genre: 'mystery',
    role: 'user',
  })
  if (!created.success) throw new Error('fixture user not created')
  return { users, tokens, user: created.data }
}

// Minimal app with the same middleware order the real routes use
function createTestApp(deps: Awaited<ReturnType<typeof setup>>) {
  const app = new Hono<AppEnv>()
  const requireAuth = createRequireAuth(deps)
  app.get('/me', requireAuth, (c) => c.json({ id: c.get('user').id }))
  app.post('/admin', requireAuth, requireRoleMiddleware('admin'), (c) => c.json({ ok: true }))
  return app
}

describe('bearerToken', () => {
  test('extracts the token', () => {
    expect(bearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi')
    expect(bearerToken('bearer abc')).toBe('abc')
  })

  test('rejects other schemes and empty values', () => {
    expect(bearerToken(undefined)).toBeNull()
    expect(bearerToken('Basic abc123')).toBeNull()
    expect(bearerToken('Bearer ')).toBeNull()
  })
})

describe('resolveCurrentUser', () => {
  test('returns the live user record', async () => {
    const deps = await setup()
    const result = await resolveCurrentUser(await deps.tokens.issue(deps.user.id, 'reader'), deps)
    expect(result).toEqual({ success: true, data: deps.user })
  })

  test('invalid token is Unauthorized', async () => {
    const deps = await setup()
    const result = await resolveCurrentUser('garbage', deps)
    expect(result).toEqual({
      success: false,
      error: { kind: 'Unauthorized', message: 'Could not validate credentials' },
    })
  })

  test('token of a deleted user is Unauthorized', async () => {
    const deps = await setup()
    const token = await deps.tokens.issue(deps.user.id, 'reader')
    deps.users.deleteUser(deps.user.id)
    const result = await resolveCurrentUser(token, deps)
    expect(result.success).toBe(false)
    if (!result.success) expect(result.error.kind).toBe('Unauthorized')
  })

  test('token naming an unknown user id is Unauthorized', async () => {
    const deps = await setup()
    const result = await resolveCurrentUser(await deps.tokens.issue(999, 'ghost'), deps)
    expect(result.success).toBe(false)
  })
})

describe('requireRole', () => {
  const base: User = {
    id: 1,
    username: 'u',
    email: 'u@example.com',
    genre: 'poetry',
    role: 'user',
    created_at: new Date(0),
  }

  test('user lacking the role is Forbidden', () => {
    expect(requireRole(base, 'admin')).toEqual({
      success: false,
      error: { kind: 'Forbidden', message: 'This operation requires the admin role' },
    })
  })

  test('matching role passes', () => {
    expect(requireRole({ ...base, role: 'admin' }, 'admin').success).toBe(true)
  })
})

describe('auth middleware', () => {
  test('missing header returns 401 with a Bearer challenge', async () => {
    const app = createTestApp(await setup())
    const res = await app.request('/me')
    expect(res.status).toBe(401)
    expect(res.headers.get('WWW-Authenticate')).toBe('Bearer')
    expect(await res.json()).toEqual({ error: 'Missing Bearer token', kind: 'Unauthorized' })
  })

  test('valid token reaches the handler', async () => {
    const deps = await setup()
    const app = createTestApp(deps)
    const token = await deps.tokens.issue(deps.user.id, 'reader')
    const res = await app.request('/me', { headers: { Authorization: `Bearer ${token}` } })
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ id: deps.user.id })
  })

  test('non-admin on an admin route gets 403', async () => {
    const deps = await setup()
    const app = createTestApp(deps)
    const token = await deps.tokens.issue(deps.user.id, 'reader')
    const res = await app.request('/admin', { method: 'POST', headers: { Authorization: `Bearer ${token}` } })
    expect(res.status).toBe(403)
    expect(await res.json()).toMatchObject({ kind: 'Forbidden' })
  })

  test('invalid token on an admin route gets 401, not 403', async () => {
    const app = createTestApp(await setup())
    const res = await app.request('/admin', { method: 'POST', headers: { Authorization: 'Bearer nope' } })
    expect(res.status).toBe(401)
    expect(await res.json()).toMatchObject({ kind: 'Unauthorized' })
  })

  test('admin passes the admin route', async () => {
    const deps = await setup()
    const admin = await deps.users.createUser({
      username: 'boss',
      email: 'boss@example.com',
      passwordHash: 'salt:key',
      genre: 'history',
      role: 'admin',
    })
    if (!admin.success) throw new Error('fixture admin not created')
    const app = createTestApp(deps)
    const token = await deps.tokens.issue(admin.data.id, 'boss')
    const res = await app.request('/admin', { method: 'POST', headers: { Authorization: `Bearer ${token}` } })
    expect(res.status).toBe(200)
  })
})
