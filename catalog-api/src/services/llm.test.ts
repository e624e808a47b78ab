import { describe, expect, test } from 'vitest'
import { FakeModel, hang } from '../__tests__/helpers/context'
import type { Book } from '../types'
import { createLlmGateway, parseTitles } from './llm'

const book: Book = {
  id: 1,
  title: 'The Hobbit',
  author: 'J. R. R. Tolkien',
  genre: 'fantasy',
  year_published: 1937,
  summary: null,
  created_at: new Date(0),
  updated_at: new Date(0),
}

describe('parseTitles', () => {
  test('normalises whitespace and drops empty entries', () => {
    const reply = 'Dune;\n  The Left Hand of Darkness ;;Hyperion\t;  ;Foundation;'
    expect(parseTitles(reply)).toEqual(['Dune', 'The Left Hand of Darkness', 'Hyperion', 'Foundation'])
  })

  test('caps the list at ten titles', () => {
    const reply = Array.from({ length: 14 }, (_, i) => `Book ${i + 1}`).join(';')
    const titles = parseTitles(reply)
    expect(titles).toHaveLength(10)
    expect(titles[9]).toBe('Book 10')
  })

  test('empty reply yields no titles', () => {
    expect(parseTitles('   ')).toEqual([])
  })
})

describe('createLlmGateway', () => {
  test('without a model every call is GatewayUnavailable', async () => {
    const gateway = createLlmGateway({ model: null, timeoutMs: 1000 })
    expect(await gateway.recommend('poetry')).toEqual({
      success: false,
      error: { kind: 'GatewayUnavailable', message: 'ANTHROPIC_API_KEY not configured' },
    })
  })

  test('summarizeBook passes the book details and content to the model', async () => {
    const model = new FakeModel()
    model.reply = async () => 'Bilbo goes there and back again.'
    const gateway = createLlmGateway({ model, timeoutMs: 1000 })

    const result = await gateway.summarizeBook(book, 'Bilbo leaves the Shire with thirteen dwarves.')
    expect(result).toEqual({ success: true, data: 'Bilbo goes there and back again.' })
    expect(model.requests[0].prompt).toBe(
      'Title: The Hobbit\nAuthor: J. R. R. Tolkien\nPublish year: 1937\nGenre: Fantasy\nBook content: Bilbo leaves the Shire with thirteen dwarves.'
    )
    expect(model.requests[0].system).toContain('NONE')
  })

  test.each(['NONE', 'NONE.', '  NONE\n', ''])('summarizeBook maps %j to InsufficientContent', async (reply) => {
    const model = new FakeModel()
    model.reply = async () => reply
    const gateway = createLlmGateway({ model, timeoutMs: 1000 })
    const result = await gateway.summarizeBook(book, 'short')
    expect(result.success).toBe(false)
    if (!result.success) expect(result.error.kind).toBe('InsufficientContent')
  })

  test('recommend asks about the genre and parses the titles', async () => {
    const model = new FakeModel()
    model.reply = async () => 'Beowulf; Leaves of Grass ;The Waste Land'
    const gateway = createLlmGateway({ model, timeoutMs: 1000 })

    const result = await gateway.recommend('poetry')
    expect(result).toEqual({ success: true, data: ['Beowulf', 'Leaves of Grass', 'The Waste Land'] })
    expect(model.requests[0].prompt).toBe('The reader is interested in the Poetry genre.')
  })

  test('a model that never answers times out', async () => {
    const model = new FakeModel()
    model.reply = hang
    const gateway = createLlmGateway({ model, timeoutMs: 20 })
    const result = await gateway.recommend('history')
    expect(result).toEqual({ success: false, error: { kind: 'GatewayTimeout', message: 'LLM request timed out' } })
  })

  test('a thrown error becomes GatewayError', async () => {
    const model = new FakeModel()
    model.reply = async () => {
      throw new Error('socket hang up')
    }
    const gateway = createLlmGateway({ model, timeoutMs: 1000 })
    const result = await gateway.summarizeReviews(['Good'])
    expect(result).toEqual({ success: false, error: { kind: 'GatewayError', message: 'LLM request failed: socket hang up' } })
  })
})
