/**
 * Type pattern parser
 *
 * pattern     := alternative ('|' alternative)*
 * alternative := type (':' filter)*
 *
 * The scanner tracks parentheses and reads `regex(...)` arguments up to
 * their closing delimiter, so `string:regex(~^\d{2}:\d{2}$~)` keeps its colon.
 */

import { UnsupportedPatternError } from '../errors.js'
import type { JsonTypeName, JsonTypeSpec } from '../types.js'
import { compileFilter, JsonTypeFilters, type CompiledFilter } from './filters.js'

// =============================================================================
// Types
// =============================================================================

export interface TypeAlternative {
  readonly type: JsonTypeName
  readonly filters: readonly CompiledFilter[]
}

export interface CompiledTypePattern {
  readonly kind: 'pattern'
  readonly source: string
  readonly alternatives: readonly TypeAlternative[]
}

export interface CompiledTypeShape {
  readonly kind: 'shape'
  readonly keys: ReadonlyArray<readonly [string, CompiledJsonType]>
}

export type CompiledJsonType = CompiledTypePattern | CompiledTypeShape

export const JSON_TYPE_NAMES: readonly JsonTypeName[] = ['string', 'integer', 'float', 'array', 'boolean', 'null']

function isJsonTypeName(value: string): value is JsonTypeName {
  return JSON_TYPE_NAMES.some((name) => name === value)
}

// =============================================================================
// Scanner
// =============================================================================

const BRACKET_DELIMITERS: Record<string, string> = { '(': ')', '{': '}', '[': ']', '<': '>' }

/**
 * Split a pattern into alternatives, each a list of trimmed segments
 * (the type first, then its filters)
 */
export function splitPattern(pattern: string): string[][] {
  const alternatives: string[][] = []
  let segments: string[] = []
  let current = ''
  let depth = 0
  let i = 0

  while (i < pattern.length) {
    const char = pattern.charAt(i)

    // `regex(` opening a segment, possibly negated
    if (depth === 0 && /^[!\s]*$/.test(current) && pattern.startsWith('regex(', i)) {
      const end = readRegexArgument(pattern, i + 'regex('.length)
      current += pattern.slice(i, end)
      i = end
      continue
    }

    if (char === '(') {
      depth++
    } else if (char === ')') {
      depth--
      if (depth < 0) {
        throw new UnsupportedPatternError(pattern, 'Unbalanced `)`')
      }
    } else if (depth === 0 && (char === ':' || char === '|')) {
      segments.push(current.trim())
      current = ''
      if (char === '|') {
        alternatives.push(segments)
        segments = []
      }
      i++
      continue
    }

    current += char
    i++
  }

  if (depth !== 0) {
    throw new UnsupportedPatternError(pattern, 'Unbalanced `(`')
  }

  segments.push(current.trim())
  alternatives.push(segments)
  return alternatives
}

/**
 * Read `~body~flags)` starting just after `regex(`; returns the index
 * after the closing parenthesis
 */
function readRegexArgument(pattern: string, start: number): number {
  let i = start
  while (/\s/.test(pattern.charAt(i))) i++

  const opening = pattern.charAt(i)
  if (opening === '' || /[\p{L}\p{N}\\\s)]/u.test(opening)) {
    throw new UnsupportedPatternError(pattern, '`regex(...)` needs a delimited expression')
  }

  const closing = BRACKET_DELIMITERS[opening] ?? opening
  let nesting = 0
  i++

  for (; i < pattern.length; i++) {
    const char = pattern.charAt(i)
    if (char === '\\') {
      i++
      continue
    }
    if (closing !== opening && char === opening) {
      nesting++
    } else if (char === closing) {
      if (nesting === 0) break
      nesting--
    }
  }

  if (i >= pattern.length) {
    throw new UnsupportedPatternError(pattern, `\`regex(...)\` is missing its closing \`${closing}\``)
  }

  i++
  while (/[A-Za-z\s]/.test(pattern.charAt(i))) i++

  if (pattern.charAt(i) !== ')') {
    throw new UnsupportedPatternError(pattern, '`regex(...)` is not closed')
  }
  return i + 1
}

// =============================================================================
// Compiler
// =============================================================================

export function parseTypePattern(pattern: string, filters: JsonTypeFilters = new JsonTypeFilters()): CompiledTypePattern {
  if (pattern.trim() === '') {
    throw new UnsupportedPatternError(pattern, 'Empty pattern')
  }

  const alternatives = splitPattern(pattern).map(([typeText = '', ...filterTexts]): TypeAlternative => {
    const type = typeText.toLowerCase()
    if (type === '') {
      throw new UnsupportedPatternError(pattern, 'Missing type')
    }
    if (!isJsonTypeName(type)) {
      throw new UnsupportedPatternError(pattern, `Unknown type \`${typeText}\``)
    }

    return {
      type,
      filters: filterTexts.map((source) => {
        if (source === '') {
          throw new UnsupportedPatternError(pattern, 'Empty filter')
        }
        return compileFilter(source, type, filters, pattern)
      }),
    }
  })

  return { kind: 'pattern', source: pattern, alternatives }
}

/**
 * Compile a pattern string or a nested key → pattern mapping
 */
export function compileJsonType(spec: JsonTypeSpec, filters: JsonTypeFilters = new JsonTypeFilters()): CompiledJsonType {
  if (typeof spec === 'string') {
    return parseTypePattern(spec, filters)
  }

  return {
    kind: 'shape',
    keys: Object.entries(spec).map(([key, nested]) => [key, compileJsonType(nested, filters)] as const),
  }
}
