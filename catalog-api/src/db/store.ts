import type { Result } from '../errors'
import type { Book, Genre, Review, Role, User, UserWithSecret } from '../types'

// ─── Credential store ───────────────────────────────────────────────────────

export interface NewUser {
  username: string
  email: string
  passwordHash: string
  genre: Genre
  role: Role
}

export interface CredentialStore {
  /** Fails with `Conflict` when the username or email is taken. */
  createUser(input: NewUser): Promise<Result<User>>
  findByUsername(username: string): Promise<UserWithSecret | null>
  findById(id: number): Promise<User | null>
}

// ─── Catalog store ──────────────────────────────────────────────────────────

export interface NewBook {
  title: string
  author: string
  genre: Genre
  year_published: number
}

export type BookPatch = Partial<NewBook>

export interface BookFilter {
  genre?: Genre
  author?: string
  limit: number
  offset: number
}

export interface NewReview {
  bookId: number
  userId: number
  rating: number
  text: string | null
}

export type InsertReviewOutcome =
  | { status: 'created'; review: Review }
  | { status: 'duplicate' }
  | { status: 'book_missing' }

export interface RatingStats {
  count: number
  sum: number
}

export interface CatalogStore {
  listBooks(filter: BookFilter): Promise<Book[]>
  getBook(id: number): Promise<Book | null>
  /** Fails with `Conflict` when another book has the same title and author. */
  createBook(input: NewBook): Promise<Result<Book>>
  /** Resolves `null` data when the book does not exist. */
  updateBook(id: number, patch: BookPatch): Promise<Result<Book | null>>
  deleteBook(id: number): Promise<boolean>
  setBookSummary(id: number, summary: string): Promise<Book | null>

  findReview(bookId: number, userId: number): Promise<Review | null>
  /** Atomic against the `(book_id, user_id)` uniqueness rule. */
  insertReview(input: NewReview): Promise<InsertReviewOutcome>
  listReviews(bookId: number): Promise<Review[]>
  ratingStats(bookId: number): Promise<RatingStats>
}
