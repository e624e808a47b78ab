import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { createMiddleware } from 'hono/factory'
import { createRequireAuth, requireRoleMiddleware, type AppEnv } from './auth/guard'
import type { TokenService } from './auth/tokens'
import type { CatalogStore, CredentialStore } from './db/store'
import type { Failure } from './errors'
import { idParam, readJson, sendFailure } from './http'
import { errorMessage, log, logger } from './logger'
import {
  BookListQuerySchema,
  CreateBookSchema,
  CreateReviewSchema,
  GenerateSummarySchema,
  LoginSchema,
  RecommendationQuerySchema,
  RegisterSchema,
  UpdateBookSchema,
  parseBody,
} from './schemas'
import { createBooksService, type BooksService } from './services/books'
import type { LlmGateway } from './services/llm'
import { createReviewsService, type ReviewsService } from './services/reviews'
import { createUsersService, type UsersService } from './services/users'
import { roleRequiredForBookMutation, type BookMutationPolicy } from './types'

export interface Services {
  users: UsersService
  books: BooksService
  reviews: ReviewsService
}

export function createServices(deps: {
  credentials: CredentialStore
  catalog: CatalogStore
  tokens: TokenService
  gateway: LlmGateway
}): Services {
  const { credentials, catalog, tokens, gateway } = deps
  return {
    users: createUsersService({ users: credentials, tokens }),
    books: createBooksService({ catalog, gateway }),
    reviews: createReviewsService({ catalog, gateway }),
  }
}

export interface AppDeps {
  services: Services
  tokens: TokenService
  credentials: CredentialStore
  gateway: LlmGateway
  bookMutationPolicy: BookMutationPolicy
  corsOrigins: string[]
}

const invalidJson: Failure = { kind: 'ValidationFailed', message: 'Invalid JSON body' }
const bookNotFound: Failure = { kind: 'NotFound', message: 'Book not found' }

const passThrough = createMiddleware<AppEnv>(async (_c, next) => {
  await next()
})

export function createApp(deps: AppDeps) {
  const { services, gateway } = deps
  const app = new Hono<AppEnv>()

  // ─── CORS: configured origins only ──────────────────────────────────────
  app.use('/*', cors({
    origin: (origin) => (deps.corsOrigins.includes(origin) ? origin : ''),
    allowHeaders: ['Content-Type', 'Authorization'],
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  }))

  app.use('*', async (c, next) => {
    const started = Date.now()
    await next()
    log('http.request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Date.now() - started,
    })
  })

  app.onError((err, c) => {
    logger.error('http.unhandled', { method: c.req.method, path: c.req.path, message: errorMessage(err) })
    return sendFailure(c, { kind: 'Internal', message: 'Internal server error' })
  })

  app.notFound((c) => sendFailure(c, { kind: 'NotFound', message: 'Not found' }))

  const requireAuth = createRequireAuth({ tokens: deps.tokens, users: deps.credentials })
  const writerRole = roleRequiredForBookMutation(deps.bookMutationPolicy)
  const requireBookWriter = writerRole ? requireRoleMiddleware(writerRole) : passThrough
  const requireAdmin = requireRoleMiddleware('admin')

  app.get('/api/health', (c) => c.json({ status: 'ok' }))

  // ─── Users & sessions ────────────────────────────────────────────────────

  app.post('/users', async (c) => {
    const json = await readJson(c)
    if (!json.ok) return sendFailure(c, invalidJson)

    const parsed = parseBody(RegisterSchema, json.body)
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const user = await services.users.register(parsed.data)
    if (!user.success) return sendFailure(c, user.error)
    return c.json(user.data, 201)
  })

  // Accepts an OAuth2-style form post as well as JSON
  app.post('/token', async (c) => {
    const contentType = c.req.header('Content-Type') ?? ''
    let body: unknown
    if (contentType.includes('application/x-www-form-urlencoded') || contentType.includes('multipart/form-data')) {
      body = await c.req.parseBody()
    } else {
      const json = await readJson(c)
      if (!json.ok) return sendFailure(c, invalidJson)
      body = json.body
    }

    const parsed = parseBody(LoginSchema, body)
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const token = await services.users.login(parsed.data.username, parsed.data.password)
    if (!token.success) return sendFailure(c, token.error)
    return c.json(token.data)
  })

  app.get('/users/me', requireAuth, (c) => c.json(c.get('user')))

  // ─── Books ───────────────────────────────────────────────────────────────

  app.get('/books', requireAuth, async (c) => {
    const parsed = parseBody(BookListQuerySchema, c.req.query())
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const books = await services.books.listBooks(parsed.data)
    return c.json({ books, page: parsed.data.page, limit: parsed.data.limit })
  })

  app.post('/books', requireAuth, requireBookWriter, async (c) => {
    const json = await readJson(c)
    if (!json.ok) return sendFailure(c, invalidJson)

    const parsed = parseBody(CreateBookSchema, json.body)
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const book = await services.books.createBook(parsed.data)
    if (!book.success) return sendFailure(c, book.error)
    return c.json(book.data, 201)
  })

  app.get('/books/:id', requireAuth, async (c) => {
    const id = idParam(c)
    if (id === null) return sendFailure(c, bookNotFound)

    const book = await services.books.getBook(id)
    if (!book.success) return sendFailure(c, book.error)
    return c.json(book.data)
  })

  app.put('/books/:id', requireAuth, requireBookWriter, async (c) => {
    const id = idParam(c)
    if (id === null) return sendFailure(c, bookNotFound)

    const json = await readJson(c)
    if (!json.ok) return sendFailure(c, invalidJson)

    const parsed = parseBody(UpdateBookSchema, json.body)
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const book = await services.books.updateBook(id, parsed.data)
    if (!book.success) return sendFailure(c, book.error)
    return c.json(book.data)
  })

  app.delete('/books/:id', requireAuth, requireBookWriter, async (c) => {
    const id = idParam(c)
    if (id === null) return sendFailure(c, bookNotFound)

    const deleted = await services.books.deleteBook(id)
    if (!deleted.success) return sendFailure(c, deleted.error)
    return c.body(null, 204)
  })

  // ─── Reviews ─────────────────────────────────────────────────────────────

  app.post('/books/:id/reviews', requireAuth, async (c) => {
    const bookId = idParam(c)
    if (bookId === null) return sendFailure(c, bookNotFound)

    const json = await readJson(c)
    if (!json.ok) return sendFailure(c, invalidJson)

    const parsed = parseBody(CreateReviewSchema, json.body)
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const review = await services.reviews.submitReview({
      bookId,
      userId: c.get('user').id,
      rating: parsed.data.rating,
      text: parsed.data.review_text,
    })
    if (!review.success) return sendFailure(c, review.error)
    return c.json(review.data, 201)
  })

  app.get('/books/:id/reviews', requireAuth, async (c) => {
    const bookId = idParam(c)
    if (bookId === null) return sendFailure(c, bookNotFound)

    const reviews = await services.reviews.listReviews(bookId)
    if (!reviews.success) return sendFailure(c, reviews.error)
    return c.json({ reviews: reviews.data })
  })

  app.get('/books/:id/reviews/summary', requireAuth, async (c) => {
    const bookId = idParam(c)
    if (bookId === null) return sendFailure(c, bookNotFound)

    const summary = await services.reviews.summarizeReviews(bookId)
    if (!summary.success) return sendFailure(c, summary.error)
    return c.json({ summary: summary.data })
  })

  // ─── Summaries & recommendations ─────────────────────────────────────────

  app.get('/books/:id/summary', requireAuth, async (c) => {
    const id = idParam(c)
    if (id === null) return sendFailure(c, bookNotFound)

    const summary = await services.books.getBookSummary(id)
    if (!summary.success) return sendFailure(c, summary.error)
    return c.json(summary.data)
  })

  app.post('/books/:id/summary', requireAuth, requireAdmin, async (c) => {
    const id = idParam(c)
    if (id === null) return sendFailure(c, bookNotFound)

    const json = await readJson(c)
    if (!json.ok) return sendFailure(c, invalidJson)

    const parsed = parseBody(GenerateSummarySchema, json.body)
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const book = await services.books.generateSummary(id, parsed.data.content)
    if (!book.success) return sendFailure(c, book.error)
    return c.json({ summary: book.data.summary, book: book.data })
  })

  app.get('/recommendations', requireAuth, async (c) => {
    const parsed = parseBody(RecommendationQuerySchema, c.req.query())
    if (!parsed.success) return sendFailure(c, { kind: 'ValidationFailed', message: parsed.error })

    const genre = parsed.data.genre ?? c.get('user').genre
    const titles = await gateway.recommend(genre)
    if (!titles.success) return sendFailure(c, titles.error)
    return c.json({ genre, titles: titles.data })
  })

  return app
}
