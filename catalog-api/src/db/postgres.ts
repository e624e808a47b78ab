import { readFile } from 'fs/promises'
import postgres from 'postgres'
import { fail, ok } from '../errors'
import type { Book, Review, User, UserWithSecret } from '../types'
import type { CatalogStore, CredentialStore } from './store'

export type Sql = postgres.Sql

export function connect(databaseUrl: string, options: { max: number }): Sql {
  return postgres(databaseUrl, {
    max: options.max,
    idle_timeout: 20,
    connect_timeout: 10,
  })
}

const schemaPath = new URL('../../db/schema.sql', import.meta.url)

export async function ensureSchema(sql: Sql): Promise<void> {
  const ddl = await readFile(schemaPath, 'utf-8')
  await sql.unsafe(ddl)
}

// ─── Error classification ───────────────────────────────────────────────────

const UNIQUE_VIOLATION = '23505'
const FOREIGN_KEY_VIOLATION = '23503'

function violation(err: unknown, code: string): { constraint: string | undefined } | null {
  if (err instanceof postgres.PostgresError && err.code === code) {
    return { constraint: err.constraint_name }
  }
  return null
}

/** ILIKE pattern matching `term` literally anywhere in the value. */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, '\\$&')}%`
}

// ─── Credential store ───────────────────────────────────────────────────────

export function createPostgresCredentialStore(sql: Sql): CredentialStore {
  return {
    async createUser(input) {
      try {
        const rows = await sql<User[]>`
          INSERT INTO catalog.users (username, email, password_hash, genre, role)
          VALUES (${input.username}, ${input.email}, ${input.passwordHash}, ${input.genre}, ${input.role})
          RETURNING id, username, email, genre, role, created_at
        `
        return ok(rows[0])
      } catch (err) {
        const dup = violation(err, UNIQUE_VIOLATION)
        if (!dup) throw err
        const field = dup.constraint === 'users_email_key' ? 'Email' : 'Username'
        return fail('Conflict', `${field} already registered`)
      }
    },

    async findByUsername(username) {
      const rows = await sql<UserWithSecret[]>`
        SELECT id, username, email, password_hash, genre, role, created_at
        FROM catalog.users
        WHERE username = ${username}
      `
      return rows[0] ?? null
    },

    async findById(id) {
      const rows = await sql<User[]>`
        SELECT id, username, email, genre, role, created_at
        FROM catalog.users
        WHERE id = ${id}
      `
      return rows[0] ?? null
    },
  }
}

// ─── Catalog store ──────────────────────────────────────────────────────────

export function createPostgresCatalogStore(sql: Sql): CatalogStore {
  return {
    async listBooks({ genre, author, limit, offset }) {
      return sql<Book[]>`
        SELECT id, title, author, genre, year_published, summary, created_at, updated_at
        FROM catalog.books
        WHERE TRUE
          ${genre ? sql`AND genre = ${genre}` : sql``}
          ${author ? sql`AND author ILIKE ${containsPattern(author)}` : sql``}
        ORDER BY title ASC, id ASC
        LIMIT ${limit} OFFSET ${offset}
      `
    },

    async getBook(id) {
      const rows = await sql<Book[]>`
        SELECT id, title, author, genre, year_published, summary, created_at, updated_at
        FROM catalog.books
        WHERE id = ${id}
      `
      return rows[0] ?? null
    },

    async createBook(input) {
      try {
        const rows = await sql<Book[]>`
          INSERT INTO catalog.books (title, author, genre, year_published)
          VALUES (${input.title}, ${input.author}, ${input.genre}, ${input.year_published})
          RETURNING id, title, author, genre, year_published, summary, created_at, updated_at
        `
        return ok(rows[0])
      } catch (err) {
        if (!violation(err, UNIQUE_VIOLATION)) throw err
        return fail('Conflict', 'A book with this title and author already exists')
      }
    },

    async updateBook(id, patch) {
      try {
        const rows = await sql<Book[]>`
          UPDATE catalog.books SET
            title = COALESCE(${patch.title ?? null}, title),
            author = COALESCE(${patch.author ?? null}, author),
            genre = COALESCE(${patch.genre ?? null}, genre),
            year_published = COALESCE(${patch.year_published ?? null}::int, year_published),
            updated_at = NOW()
          WHERE id = ${id}
          RETURNING id, title, author, genre, year_published, summary, created_at, updated_at
        `
        return ok(rows[0] ?? null)
      } catch (err) {
        if (!violation(err, UNIQUE_VIOLATION)) throw err
        return fail('Conflict', 'A book with this title and author already exists')
      }
    },

    async deleteBook(id) {
      const rows = await sql`DELETE FROM catalog.books WHERE id = ${id} RETURNING id`
      return rows.length > 0
    },

    async setBookSummary(id, summary) {
      const rows = await sql<Book[]>`
        UPDATE catalog.books SET summary = ${summary}, updated_at = NOW()
        WHERE id = ${id}
        RETURNING id, title, author, genre, year_published, summary, created_at, updated_at
      `
      return rows[0] ?? null
    },

    async findReview(bookId, userId) {
      const rows = await sql<Review[]>`
        SELECT id, book_id, user_id, review_text, rating, created_at
        FROM catalog.reviews
        WHERE book_id = ${bookId} AND user_id = ${userId}
      `
      return rows[0] ?? null
    },

    async insertReview({ bookId, userId, rating, text }) {
      try {
        // reviews_book_user_key settles concurrent submissions
        const rows = await sql<Review[]>`
          INSERT INTO catalog.reviews (book_id, user_id, review_text, rating)
          VALUES (${bookId}, ${userId}, ${text}, ${rating})
          ON CONFLICT ON CONSTRAINT reviews_book_user_key DO NOTHING
          RETURNING id, book_id, user_id, review_text, rating, created_at
        `
        if (rows.length === 0) return { status: 'duplicate' }
        return { status: 'created', review: rows[0] }
      } catch (err) {
        if (!violation(err, FOREIGN_KEY_VIOLATION)) throw err
        return { status: 'book_missing' }
      }
    },

    async listReviews(bookId) {
      return sql<Review[]>`
        SELECT id, book_id, user_id, review_text, rating, created_at
        FROM catalog.reviews
        WHERE book_id = ${bookId}
        ORDER BY created_at ASC, id ASC
      `
    },

    async ratingStats(bookId) {
      const rows = await sql<{ count: number; sum: number }[]>`
        SELECT COUNT(*)::int AS count, COALESCE(SUM(rating), 0)::int AS sum
        FROM catalog.reviews
        WHERE book_id = ${bookId}
      `
      return rows[0] ?? { count: 0, sum: 0 }
    },
  }
}
