import type { Context } from 'hono'
import { statusFor, type Failure } from './errors'

/** Renders a failure as `{ error, kind }` with its mapped status. */
export function sendFailure(c: Context, error: Failure) {
  const status = statusFor(error.kind)
  if (status === 401) {
    c.header('WWW-Authenticate', 'Bearer')
  }
  return c.json({ error: error.message, kind: error.kind }, status)
}

export async function readJson(c: Context): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await c.req.json() }
  } catch {
    return { ok: false }
  }
}

// Ids are SERIAL (int4) columns
export const MAX_ID = 2_147_483_647

/** Positive int4 route parameter, or `null`. */
export function idParam(c: Context, name = 'id'): number | null {
  const raw = c.req.param(name)
  if (!raw || !/^\d{1,10}$/.test(raw)) return null
  const id = Number(raw)
  return id > 0 && id <= MAX_ID ? id : null
}
