import Anthropic from '@anthropic-ai/sdk'
import { fail, ok, type Result } from '../errors'
import { errorMessage, logger } from '../logger'
import { genreLabel, type Book, type Genre } from '../types'

// ─── Model seam ─────────────────────────────────────────────────────────────

export interface CompletionRequest {
  system: string
  prompt: string
  maxTokens: number
  signal: AbortSignal
}

export interface TextModel {
  complete(request: CompletionRequest): Promise<string>
}

export function createAnthropicModel(client: Anthropic, model: string): TextModel {
  return {
    async complete({ system, prompt, maxTokens, signal }) {
      const message = await client.messages.create(
        { model, max_tokens: maxTokens, system, messages: [{ role: 'user', content: prompt }] },
        { signal },
      )
      for (const block of message.content) {
        if (block.type === 'text') return block.text
      }
      return ''
    },
  }
}

// ─── Gateway ────────────────────────────────────────────────────────────────

/** Reply the model is told to give when the supplied content is too thin. */
export const INSUFFICIENT_CONTENT_SENTINEL = 'NONE'

export const RECOMMENDATION_COUNT = 10

export interface LlmGateway {
  summarizeBook(book: Book, content: string): Promise<Result<string>>
  summarizeReviews(texts: string[]): Promise<Result<string>>
  recommend(genre: Genre): Promise<Result<string[]>>
}

export interface LlmGatewayOptions {
  /** `null` when no API key is configured. */
  model: TextModel | null
  timeoutMs: number
}

/** Splits a `;`-delimited reply into clean titles. */
export function parseTitles(reply: string, limit = RECOMMENDATION_COUNT): string[] {
  return reply
    .replace(/\s+/g, ' ')
    .split(';')
    .map((title) => title.trim())
    .filter((title) => title.length > 0)
    .slice(0, limit)
}

function isAbort(err: unknown): boolean {
  return err instanceof Anthropic.APIUserAbortError || (err instanceof Error && err.name === 'AbortError')
}

export function createLlmGateway({ model, timeoutMs }: LlmGatewayOptions): LlmGateway {
  async function run(task: string, system: string, prompt: string, maxTokens: number): Promise<Result<string>> {
    if (!model) {
      return fail('GatewayUnavailable', 'ANTHROPIC_API_KEY not configured')
    }

    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), timeoutMs)
    const started = Date.now()

    try {
      const text = await model.complete({ system, prompt, maxTokens, signal: controller.signal })
      logger.debug('llm.complete', { task, ms: Date.now() - started })
      return ok(text.trim())
    } catch (err) {
      if (controller.signal.aborted || isAbort(err)) {
        logger.error('llm.timeout', { task, timeout_ms: timeoutMs })
        return fail('GatewayTimeout', 'LLM request timed out')
      }
      if (err instanceof Anthropic.APIError) {
        logger.error('llm.api_error', { task, status: err.status, message: err.message })
        return fail('GatewayError', `LLM request failed: ${err.message}`)
      }
      const msg = errorMessage(err)
      logger.error('llm.failed', { task, message: msg })
      return fail('GatewayError', `LLM request failed: ${msg}`)
    } finally {
      clearTimeout(timeout)
    }
  }

  return {
    async summarizeBook(book, content) {
      const system = `Summarize the book described by the user in about 100 words. Base the summary only on the book content provided, not on prior knowledge of the title, and do not comment on whether the content matches the title. If the book content is too short to summarize, reply with exactly ${INSUFFICIENT_CONTENT_SENTINEL}.`
      const prompt = [
        `Title: ${book.title}`,
        `Author: ${book.author}`,
        `Publish year: ${book.year_published}`,
        `Genre: ${genreLabel(book.genre)}`,
        `Book content: ${content}`,
      ].join('\n')

      const result = await run('summarize_book', system, prompt, 400)
      if (!result.success) return result
      if (result.data === '' || result.data.includes(INSUFFICIENT_CONTENT_SENTINEL)) {
        return fail('InsufficientContent', 'Please provide enough book content to generate summary')
      }
      return result
    },

    async summarizeReviews(texts) {
      const system = 'Summarize these reader reviews of one book in two or three sentences. Mention the points readers agree on.'
      const prompt = texts.map((text, i) => `Review ${i + 1}: ${text}`).join('\n')
      return run('summarize_reviews', system, prompt, 300)
    },

    async recommend(genre) {
      const system = `Recommend books to a reader based on their interest. Reply with a list of ${RECOMMENDATION_COUNT} book titles separated by ';' and nothing else: no numbering, no line breaks.`
      const prompt = `The reader is interested in the ${genreLabel(genre)} genre.`

      const result = await run('recommend', system, prompt, 400)
      if (!result.success) return result
      return ok(parseTitles(result.data))
    },
  }
}
