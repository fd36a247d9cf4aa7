import type { MatchResult } from './types.js'

export const ErrorCode = {
  DECODE_ERROR: 'DECODE_ERROR',
  QUERY_ERROR: 'QUERY_ERROR',
  UNSUPPORTED_PATTERN: 'UNSUPPORTED_PATTERN',
  ASSERTION_MISMATCH: 'ASSERTION_MISMATCH',
  INVALID_SCHEMA: 'INVALID_SCHEMA',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode]

export type QueryLanguage = 'jsonpath' | 'xpath'

// =============================================================================
// JsonAssertError — base class carrying a stable error code
// =============================================================================

export class JsonAssertError extends Error {
  code: ErrorCodeType

  constructor(message: string, code: ErrorCodeType, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'JsonAssertError'
    this.code = code
  }
}

/**
 * Raised when text is not valid JSON, or when an author-supplied literal
 * cannot be represented as JSON.
 */
export class DecodeError extends JsonAssertError {
  input: string
  reason: string

  constructor(input: string, reason: string, format = 'Invalid json: %s. System message: %s.') {
    super(formatMessage(format, input, reason), ErrorCode.DECODE_ERROR)
    this.name = 'DecodeError'
    this.input = input
    this.reason = reason
  }
}

export class QueryError extends JsonAssertError {
  language: QueryLanguage
  expression: string
  reason: string

  constructor(language: QueryLanguage, expression: string, reason: string, options?: { cause?: unknown }) {
    const label = language === 'jsonpath' ? 'JSONPath' : 'XPath'
    super(`Invalid ${label} \`${expression}\`: ${reason}`, ErrorCode.QUERY_ERROR, options)
    this.name = 'QueryError'
    this.language = language
    this.expression = expression
    this.reason = reason
  }
}

/**
 * Raised while parsing a type pattern, before any value is inspected.
 */
export class UnsupportedPatternError extends JsonAssertError {
  pattern: string

  constructor(pattern: string, message: string, options?: { cause?: unknown }) {
    super(`${message} in pattern \`${pattern}\``, ErrorCode.UNSUPPORTED_PATTERN, options)
    this.name = 'UnsupportedPatternError'
    this.pattern = pattern
  }
}

export class AssertionMismatch extends JsonAssertError {
  result: MatchResult

  constructor(result: MatchResult) {
    super(result.message || 'Assertion failed', ErrorCode.ASSERTION_MISMATCH)
    this.name = 'AssertionMismatch'
    this.result = result
  }
}

function formatMessage(format: string, ...args: string[]): string {
  let next = 0
  return format.replace(/%s/g, () => args[next++] ?? '')
}

export function isJsonAssertError(error: unknown): error is JsonAssertError {
  return error instanceof JsonAssertError
}

/**
 * Throw when a matcher result did not pass
 */
export function assertPassed(result: MatchResult): void {
  if (!result.passed) {
    throw new AssertionMismatch(result)
  }
}
