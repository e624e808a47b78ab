// ─── Closed sets ─────────────────────────────────────────────────────────────

export const GENRES = [
  'fiction',
  'non_fiction',
  'mystery',
  'thriller',
  'fantasy',
  'science_fiction',
  'romance',
  'horror',
  'biography',
  'history',
  'self_help',
  'poetry',
] as const

export type Genre = (typeof GENRES)[number]

export const ROLES = ['user', 'admin'] as const

export type Role = (typeof ROLES)[number]

export function isGenre(value: string): value is Genre {
  return GENRES.some((genre) => genre === value)
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`)
}

/** Human-readable genre name, as used in prompts. */
export function genreLabel(genre: Genre): string {
  switch (genre) {
    case 'fiction': return 'Fiction'
    case 'non_fiction': return 'Non-fiction'
    case 'mystery': return 'Mystery'
    case 'thriller': return 'Thriller'
    case 'fantasy': return 'Fantasy'
    case 'science_fiction': return 'Science fiction'
    case 'romance': return 'Romance'
    case 'horror': return 'Horror'
    case 'biography': return 'Biography'
    case 'history': return 'History'
    case 'self_help': return 'Self-help'
    case 'poetry': return 'Poetry'
    default: return assertNever(genre)
  }
}

// ─── Book-mutation policy ───────────────────────────────────────────────────

export const BOOK_MUTATION_POLICIES = ['authenticated', 'admin'] as const

export type BookMutationPolicy = (typeof BOOK_MUTATION_POLICIES)[number]

/** Role a caller must hold to create, update or delete books, if any. */
export function roleRequiredForBookMutation(policy: BookMutationPolicy): Role | null {
  switch (policy) {
    case 'authenticated': return null
    case 'admin': return 'admin'
    default: return assertNever(policy)
  }
}

// ─── Records ─────────────────────────────────────────────────────────────────

export interface User {
  id: number
  username: string
  email: string
  genre: Genre
  role: Role
  created_at: Date
}

export interface UserWithSecret extends User {
  password_hash: string
}

export interface Book {
  id: number
  title: string
  author: string
  genre: Genre
  year_published: number
  summary: string | null
  created_at: Date
  updated_at: Date
}

export interface Review {
  id: number
  book_id: number
  user_id: number
  review_text: string | null
  rating: number
  created_at: Date
}

/** Marker reported instead of an average when a book has no ratings yet. */
export const NOT_AVAILABLE = 'NA'

export type AverageRating = number | typeof NOT_AVAILABLE

export interface BookSummary {
  book_id: number
  summary: string | null
  average_rating: AverageRating
  review_count: number
}
