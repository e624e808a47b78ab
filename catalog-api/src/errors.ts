import type { ContentfulStatusCode } from 'hono/utils/http-status'

export type FailureKind =
  | 'ValidationFailed'
  | 'InvalidCredentials'
  | 'Unauthorized'
  | 'Forbidden'
  | 'NotFound'
  | 'Conflict'
  | 'DuplicateReview'
  | 'InvalidRating'
  | 'InsufficientContent'
  | 'GatewayError'
  | 'GatewayUnavailable'
  | 'GatewayTimeout'
  | 'Internal'

export interface Failure {
  kind: FailureKind
  message: string
}

export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: Failure }

export function ok<T>(data: T): Result<T> {
  return { success: true, data }
}

export function fail<T = never>(kind: FailureKind, message: string): Result<T> {
  return { success: false, error: { kind, message } }
}

export function statusFor(kind: FailureKind): ContentfulStatusCode {
  switch (kind) {
    case 'ValidationFailed':
    case 'InvalidCredentials':
    case 'Conflict':
    case 'DuplicateReview':
    case 'InvalidRating':
    case 'InsufficientContent':
      return 400
    case 'Unauthorized':
      return 401
    case 'Forbidden':
      return 403
    case 'NotFound':
      return 404
    case 'GatewayError':
      return 502
    case 'GatewayUnavailable':
      return 503
    case 'GatewayTimeout':
      return 504
    case 'Internal':
      return 500
    default: {
      const unhandled: never = kind
      throw new Error(`Unhandled failure kind: ${String(unhandled)}`)
    }
  }
}
