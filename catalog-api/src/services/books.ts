import type { BookPatch, CatalogStore, NewBook } from '../db/store'
import { fail, ok, type Result } from '../errors'
import { log } from '../logger'
import { NOT_AVAILABLE, type AverageRating, type Book, type BookSummary, type Genre } from '../types'
import type { LlmGateway } from './llm'

export interface BookQuery {
  genre?: Genre
  author?: string
  page: number
  limit: number
}

export interface BooksService {
  listBooks(query: BookQuery): Promise<Book[]>
  getBook(id: number): Promise<Result<Book>>
  createBook(input: NewBook): Promise<Result<Book>>
  updateBook(id: number, patch: BookPatch): Promise<Result<Book>>
  deleteBook(id: number): Promise<Result<void>>
  getBookSummary(id: number): Promise<Result<BookSummary>>
  generateSummary(id: number, content: string): Promise<Result<Book>>
}

/** Mean rating rounded to two decimals, or the "not available" marker. */
export function averageRating(count: number, sum: number): AverageRating {
  if (count === 0) return NOT_AVAILABLE
  return Math.round((sum / count) * 100) / 100
}

const notFound = () => fail('NotFound', 'Book not found')

export function createBooksService(deps: { catalog: CatalogStore; gateway: LlmGateway }): BooksService {
  const { catalog, gateway } = deps

  return {
    async listBooks({ genre, author, page, limit }) {
      return catalog.listBooks({ genre, author, limit, offset: (page - 1) * limit })
    },

    async getBook(id) {
      const book = await catalog.getBook(id)
      return book ? ok(book) : notFound()
    },

    async createBook(input) {
      const created = await catalog.createBook(input)
      if (created.success) log('book.created', { book_id: created.data.id })
      return created
    },

    async updateBook(id, patch) {
      const updated = await catalog.updateBook(id, patch)
      if (!updated.success) return updated
      return updated.data ? ok(updated.data) : notFound()
    },

    async deleteBook(id) {
      if (!(await catalog.deleteBook(id))) return notFound()
      log('book.deleted', { book_id: id })
      return ok(undefined)
    },

    async getBookSummary(id) {
      const book = await catalog.getBook(id)
      if (!book) return notFound()
      const { count, sum } = await catalog.ratingStats(id)
      return ok({
        book_id: book.id,
        summary: book.summary,
        average_rating: averageRating(count, sum),
        review_count: count,
      })
    },

    async generateSummary(id, content) {
      const book = await catalog.getBook(id)
      if (!book) return notFound()

      // Nothing is written unless the gateway produced a usable summary
      const summary = await gateway.summarizeBook(book, content)
      if (!summary.success) return summary

      const updated = await catalog.setBookSummary(id, summary.data)
      if (!updated) return notFound()
      log('book.summary_generated', { book_id: id })
      return ok(updated)
    },
  }
}
