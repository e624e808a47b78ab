import { createMiddleware } from 'hono/factory'
import type { CredentialStore } from '../db/store'
import { fail, ok, type Result } from '../errors'
import { sendFailure } from '../http'
import type { Role, User } from '../types'
import type { TokenService } from './tokens'

export type AppEnv = {
  Variables: {
    user: User
  }
}

export interface GuardDeps {
  tokens: TokenService
  users: CredentialStore
}

const unauthorized = () => fail('Unauthorized', 'Could not validate credentials')

export function bearerToken(header: string | undefined): string | null {
  const match = header?.match(/^Bearer\s+(\S+)\s*$/i)
  return match ? match[1] : null
}

/**
 * Verifies the token and loads its user. The user is looked up on every call,
 * so a token outliving its account stops working.
 */
export async function resolveCurrentUser(token: string, deps: GuardDeps): Promise<Result<User>> {
  const claims = await deps.tokens.verify(token)
  if (!claims.success) return unauthorized()

  const user = await deps.users.findById(claims.data.userId)
  if (!user) return unauthorized()

  return ok(user)
}

export function requireRole(user: User, role: Role): Result<void> {
  if (user.role !== role) {
    return fail('Forbidden', `This operation requires the ${role} role`)
  }
  return ok(undefined)
}

// ─── Middleware ─────────────────────────────────────────────────────────────

export function createRequireAuth(deps: GuardDeps) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const token = bearerToken(c.req.header('Authorization'))
    if (!token) {
      return sendFailure(c, { kind: 'Unauthorized', message: 'Missing Bearer token' })
    }

    const user = await resolveCurrentUser(token, deps)
    if (!user.success) return sendFailure(c, user.error)

    c.set('user', user.data)
    await next()
  })
}

/** Must be mounted after the auth middleware. */
export function requireRoleMiddleware(role: Role) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const user = c.get('user')
    if (!user) return sendFailure(c, { kind: 'Unauthorized', message: 'Could not validate credentials' })

    const allowed = requireRole(user, role)
    if (!allowed.success) return sendFailure(c, allowed.error)

    await next()
  })
}
