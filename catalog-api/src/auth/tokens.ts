import { sign, verify } from 'hono/jwt'
import { z } from 'zod'
import { fail, ok, type Result } from '../errors'

const ALGORITHM = 'HS256'

export const DEFAULT_TOKEN_TTL_SECONDS = 30 * 60

export interface TokenClaims {
  userId: number
  username: string
}

const ClaimsSchema = z.object({
  user_id: z.number().int().positive(),
  sub: z.string().min(1),
  exp: z.number(),
})

export interface TokenServiceOptions {
  secret: string
  ttlSeconds?: number
  /** Milliseconds since the epoch. */
  now?: () => number
}

export interface TokenService {
  issue(userId: number, username: string, ttlSeconds?: number): Promise<string>
  verify(token: string): Promise<Result<TokenClaims>>
}

const invalid = () => fail<TokenClaims>('InvalidCredentials', 'Could not validate credentials')

export function createTokenService(options: TokenServiceOptions): TokenService {
  const { secret } = options
  const defaultTtl = options.ttlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS
  const now = options.now ?? Date.now

  return {
    async issue(userId, username, ttlSeconds = defaultTtl) {
      const issuedAt = Math.floor(now() / 1000)
      return sign(
        { user_id: userId, sub: username, iat: issuedAt, exp: issuedAt + ttlSeconds },
        secret,
        ALGORITHM,
      )
    },

    async verify(token) {
      let payload: unknown
      try {
        // Rejects bad signatures, malformed tokens and expiry against the wall clock
        payload = await verify(token, secret, ALGORITHM)
      } catch {
        return invalid()
      }

      const claims = ClaimsSchema.safeParse(payload)
      if (!claims.success) return invalid()
      if (claims.data.exp <= Math.floor(now() / 1000)) return invalid()

      return ok({ userId: claims.data.user_id, username: claims.data.sub })
    },
  }
}
