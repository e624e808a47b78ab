import { z } from 'zod'
import { GENRES } from './types'

// ─── User Schemas ────────────────────────────────────────────────────────────

const usernamePattern = /^[A-Za-z0-9_.-]+$/

export const RegisterSchema = z.object({
  username: z.string().min(3).max(50).regex(usernamePattern, 'Username may contain letters, digits, ".", "_" and "-"'),
  email: z.string().email().max(255),
  password: z.string().min(8).max(128),
  genre: z.enum(GENRES),
})

export const LoginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
})

// ─── Book Schemas ────────────────────────────────────────────────────────────

const bookFields = {
  title: z.string().trim().min(1).max(255),
  author: z.string().trim().min(1).max(255),
  genre: z.enum(GENRES),
  year_published: z.number().int().min(0).max(9999),
}

export const CreateBookSchema = z.object(bookFields)

export const UpdateBookSchema = z
  .object(bookFields)
  .partial()
  .refine((data) => Object.values(data).some((v) => v !== undefined), {
    message: 'At least one field must be provided',
  })

// Keeps (page - 1) * limit a plain integer for OFFSET
export const MAX_PAGE = 100_000

export const BookListQuerySchema = z.object({
  genre: z.enum(GENRES).optional(),
  author: z.string().trim().min(1).max(255).optional(),
  page: z.coerce.number().int().min(1).max(MAX_PAGE).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
})

export const GenerateSummarySchema = z.object({
  content: z.string().trim().min(1).max(50_000),
})

// ─── Review Schemas ──────────────────────────────────────────────────────────

// Range and integrality are the review service's call (InvalidRating)
export const CreateReviewSchema = z.object({
  rating: z.number(),
  review_text: z.string().max(5000).nullable().optional(),
})

// ─── Recommendation Schemas ─────────────────────────────────────────────────

export const RecommendationQuerySchema = z.object({
  genre: z.enum(GENRES).optional(),
})

// ─── Parse helper ────────────────────────────────────────────────────────────

export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(body)
  if (result.success) {
    return { success: true, data: result.data }
  }

  const messages = result.error.issues.map(
    (issue) => `${issue.path.join('.')}: ${issue.message}`
  )
  return { success: false, error: messages.join('; ') }
}
