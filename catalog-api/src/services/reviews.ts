import type { CatalogStore } from '../db/store'
import { fail, ok, type Result } from '../errors'
import type { Review } from '../types'
import type { LlmGateway } from './llm'

export const MIN_RATING = 1
export const MAX_RATING = 5

export function isValidRating(rating: number): boolean {
  return Number.isInteger(rating) && rating >= MIN_RATING && rating <= MAX_RATING
}

export interface ReviewSubmission {
  bookId: number
  userId: number
  rating: number
  text?: string | null
}

export interface ReviewsService {
  submitReview(input: ReviewSubmission): Promise<Result<Review>>
  listReviews(bookId: number): Promise<Result<Review[]>>
  summarizeReviews(bookId: number): Promise<Result<string>>
}

const bookNotFound = () => fail('NotFound', 'Book not found')
const duplicate = () => fail('DuplicateReview', 'You have already reviewed this book')

export function createReviewsService(deps: { catalog: CatalogStore; gateway: LlmGateway }): ReviewsService {
  const { catalog, gateway } = deps

  return {
    async submitReview({ bookId, userId, rating, text }) {
      if (!(await catalog.getBook(bookId))) return bookNotFound()

      if (await catalog.findReview(bookId, userId)) return duplicate()

      if (!isValidRating(rating)) {
        return fail('InvalidRating', `Rating must be an integer between ${MIN_RATING} and ${MAX_RATING}`)
      }

      // The store decides races the check above could not see
      const outcome = await catalog.insertReview({ bookId, userId, rating, text: text?.trim() || null })
      switch (outcome.status) {
        case 'created': return ok(outcome.review)
        case 'duplicate': return duplicate()
        case 'book_missing': return bookNotFound()
      }
    },

    async listReviews(bookId) {
      if (!(await catalog.getBook(bookId))) return bookNotFound()
      return ok(await catalog.listReviews(bookId))
    },

    async summarizeReviews(bookId) {
      if (!(await catalog.getBook(bookId))) return bookNotFound()
      const texts = (await catalog.listReviews(bookId))
        .map((r) => r.review_text?.trim() ?? '')
        .filter((t) => t.length > 0)
      if (texts.length === 0) {
        return fail('InsufficientContent', 'This book has no written reviews to summarize')
      }
      return gateway.summarizeReviews(texts)
    },
  }
}
