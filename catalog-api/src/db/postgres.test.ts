import { describe, expect, test } from 'vitest'
import { containsPattern } from './postgres'

describe('containsPattern', () => {
  test('wraps a plain term in wildcards', () => {
    expect(containsPattern('herbert')).toBe('%herbert%')
  })

  test('escapes LIKE wildcards so they match literally', () => {
    expect(containsPattern('%')).toBe('%\\%%')
    expect(containsPattern('a_b')).toBe('%a\\_b%')
  })

  test('escapes the escape character itself', () => {
    expect(containsPattern('c:\\books')).toBe('%c:\\\\books%')
  })
})
