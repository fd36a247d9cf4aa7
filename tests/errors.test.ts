import { describe, it, expect } from 'vitest'
import {
  AssertionMismatch,
  DecodeError,
  ErrorCode,
  JsonAssertError,
  QueryError,
  UnsupportedPatternError,
  assertPassed,
  isJsonAssertError,
} from '../src/index.js'

describe('DecodeError', () => {
  it('formats input and reason', () => {
    const error = new DecodeError('{x', 'Unexpected token')

    expect(error.message).toBe('Invalid json: {x. System message: Unexpected token.')
    expect(error.code).toBe(ErrorCode.DECODE_ERROR)
    expect(error.name).toBe('DecodeError')
    expect(error).toBeInstanceOf(JsonAssertError)
  })

  it('accepts a custom format', () => {
    expect(new DecodeError('a', 'b', 'Bad %s (%s)').message).toBe('Bad a (b)')
  })
})

describe('QueryError', () => {
  it('names the query language', () => {
    expect(new QueryError('jsonpath', '$[', 'unexpected end').message).toBe('Invalid JSONPath `$[`: unexpected end')
    expect(new QueryError('xpath', '//[', 'bad step').message).toBe('Invalid XPath `//[`: bad step')
  })

  it('keeps the cause', () => {
    const cause = new Error('library failure')

    expect(new QueryError('xpath', '//a', 'x', { cause }).cause).toBe(cause)
  })
})

describe('UnsupportedPatternError', () => {
  it('appends the pattern', () => {
    const error = new UnsupportedPatternError('strng', 'Unknown type `strng`')

    expect(error.message).toBe('Unknown type `strng` in pattern `strng`')
    expect(error.code).toBe(ErrorCode.UNSUPPORTED_PATTERN)
  })
})

describe('assertPassed', () => {
  it('does nothing for a passing result', () => {
    expect(() => assertPassed({ passed: true })).not.toThrow()
  })

  it('throws the failure message', () => {
    const result = { passed: false, message: 'values differ' }

    try {
      assertPassed(result)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(AssertionMismatch)
      if (error instanceof AssertionMismatch) {
        expect(error.message).toBe('values differ')
        expect(error.result).toBe(result)
        expect(error.code).toBe(ErrorCode.ASSERTION_MISMATCH)
      }
    }
  })

  it('falls back to a generic message', () => {
    expect(() => assertPassed({ passed: false })).toThrow('Assertion failed')
  })
})

describe('isJsonAssertError', () => {
  it('recognizes library errors', () => {
    expect(isJsonAssertError(new DecodeError('', 'empty'))).toBe(true)
    expect(isJsonAssertError(new Error('other'))).toBe(false)
    expect(isJsonAssertError('text')).toBe(false)
  })
})
