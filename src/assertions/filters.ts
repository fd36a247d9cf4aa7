/**
 * Value filters for type patterns (`string:url`, `integer:>0`, `string:regex(~^a~)`)
 * and the registry of custom filters.
 */

import { ErrorCode, JsonAssertError, UnsupportedPatternError } from '../errors.js'
import { parseNumericString } from '../helpers/numbers.js'
import type { JsonTypeName, JsonValue } from '../types.js'
import { isJsonArray, isJsonObject } from '../value.js'
import { looseScalarEquals } from './contains.js'

// =============================================================================
// Types
// =============================================================================

export type FilterFunction = (value: JsonValue, ...args: string[]) => boolean

export interface CompiledFilter {
  /** Filter text as written in the pattern */
  readonly source: string
  test(value: JsonValue): boolean
}

interface BuiltinFilter {
  /** Types the filter may follow; any type when absent */
  readonly types?: readonly JsonTypeName[]
  test(value: JsonValue): boolean
}

// =============================================================================
// Format Validators
// =============================================================================

const ISO_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-](\d{2}):(\d{2}))?)?$/

export const FORMAT_VALIDATORS: Record<'url' | 'date' | 'email', (value: string) => boolean> = {
  url: (v) => {
    try {
      new URL(v)
      return true
    } catch {
      return false
    }
  },
  date: (v) => {
    const match = ISO_DATE.exec(v)
    if (!match) return false
    // Absent time parts read as 0
    const [, year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0, offsetHour = 0, offsetMinute = 0] =
      match.map((part) => Number(part ?? '0'))
    if (!isCalendarDate(year, month, day)) return false
    return hour < 24 && minute < 60 && second < 60 && offsetHour < 24 && offsetMinute < 60
  },
  email: (v) => /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(v),
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false
  const date = new Date(Date.UTC(year, month - 1, day))
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day
}

// =============================================================================
// Regular expressions
// =============================================================================

const CLOSING_DELIMITERS: Record<string, string> = { '(': ')', '{': '}', '[': ']', '<': '>' }
const REGEX_FLAGS = new Set(['i', 'm', 's', 'u'])

/**
 * Compile a delimited expression such as `~^a@b$~i` or `{\d+}`.
 * The delimiter is the first character; bracket delimiters close with their
 * counterpart, anything after the closing delimiter is read as flags.
 */
export function parseDelimitedRegex(argument: string, pattern: string): RegExp {
  const opening = argument.charAt(0)
  if (opening === '' || /[\p{L}\p{N}\\\s]/u.test(opening)) {
    throw new UnsupportedPatternError(pattern, `Regular expression \`${argument}\` needs a delimiter`)
  }

  const closing = CLOSING_DELIMITERS[opening] ?? opening
  const end = argument.lastIndexOf(closing)
  if (end < 1) {
    throw new UnsupportedPatternError(pattern, `Regular expression \`${argument}\` is missing its closing \`${closing}\``)
  }

  const body = argument.slice(1, end)
  const flags = argument.slice(end + 1)
  for (const [index, flag] of [...flags].entries()) {
    if (!REGEX_FLAGS.has(flag) || flags.indexOf(flag) !== index) {
      throw new UnsupportedPatternError(pattern, `Unsupported regular expression flag \`${flag}\``)
    }
  }

  if (hasNestedQuantifier(body)) {
    throw new UnsupportedPatternError(pattern, `Regular expression \`${argument}\` nests quantifiers`)
  }

  try {
    return new RegExp(body, flags)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new UnsupportedPatternError(pattern, `Invalid regular expression \`${argument}\` (${reason})`, { cause: error })
  }
}

interface GroupScan {
  /** Some atom inside repeats */
  quantified: boolean
  /** Every pass through the group consumes a fixed literal character */
  separated: boolean
  alternated: boolean
}

const CLASS_ESCAPES = /^[dDwWsSbB1-9kpP]$/

/**
 * Whether a repeated group can match the same text in more than one way,
 * as in `(a+)+` or `(\w*\s?)*`. Such expressions can backtrack
 * exponentially. A group whose passes each end on a fixed literal, such as
 * `(\w+\.)*`, is accepted.
 */
export function hasNestedQuantifier(body: string): boolean {
  const groups: GroupScan[] = []
  let i = 0

  while (i < body.length) {
    const char = body.charAt(i)
    const current = groups[groups.length - 1]

    if (char === '(') {
      groups.push({ quantified: false, separated: false, alternated: false })
      i = skipGroupPrefix(body, i + 1)
      continue
    }

    if (char === ')') {
      const group = groups.pop() ?? { quantified: false, separated: false, alternated: false }
      const repeated = isRepeatAt(body, i + 1)
      const separated = group.separated && !group.alternated
      if (repeated && group.quantified && !separated) return true

      const parent = groups[groups.length - 1]
      if (parent) {
        if (repeated || group.quantified) parent.quantified = true
        if (separated && !isQuantifierAt(body, i + 1)) parent.separated = true
      }
      i = skipQuantifier(body, i + 1)
      continue
    }

    if (char === '|') {
      if (current) current.alternated = true
      i++
      continue
    }
    if (char === '^' || char === '$') {
      i++
      continue
    }

    const [end, literal] = readAtom(body, i)
    if (current) {
      if (isRepeatAt(body, end)) current.quantified = true
      if (literal && !isQuantifierAt(body, end)) current.separated = true
    }
    i = skipQuantifier(body, end)
  }

  return false
}

/**
 * End index of the atom at `start`, and whether it is one fixed character
 */
function readAtom(body: string, start: number): [number, boolean] {
  const char = body.charAt(start)

  if (char === '[') {
    let i = start + 1
    while (i < body.length && body.charAt(i) !== ']') {
      i += body.charAt(i) === '\\' ? 2 : 1
    }
    return [i + 1, false]
  }

  if (char === '\\') {
    const escaped = body.charAt(start + 1)
    if (escaped === 'x') return [start + 4, true]
    if (escaped === 'u') {
      const braced = /^\{[0-9A-Fa-f]+\}/.exec(body.slice(start + 2))
      return [start + 2 + (braced ? braced[0].length : 4), true]
    }
    const braces = escaped === 'k' ? '<>' : '{}'
    if ((escaped === 'p' || escaped === 'P' || escaped === 'k') && body.charAt(start + 2) === braces.charAt(0)) {
      const close = body.indexOf(braces.charAt(1), start + 2)
      return [close === -1 ? body.length : close + 1, false]
    }
    return [start + 2, !CLASS_ESCAPES.test(escaped)]
  }

  return [start + 1, char !== '.']
}

// `(?:`, `(?=`, `(?!`, `(?<=`, `(?<!`, `(?<name>`
function skipGroupPrefix(body: string, index: number): number {
  if (body.charAt(index) !== '?') return index
  const prefix = /^\?(?::|=|!|<=|<!|<[A-Za-z_$][\w$]*>)/.exec(body.slice(index))
  return prefix ? index + prefix[0].length : index + 1
}

function isRepeatAt(body: string, index: number): boolean {
  const char = body.charAt(index)
  if (char === '+' || char === '*') return true
  return char === '{' && /^\{\d+,\d*\}/.test(body.slice(index))
}

function isQuantifierAt(body: string, index: number): boolean {
  return body.charAt(index) === '?' || skipQuantifier(body, index) !== index
}

function skipQuantifier(body: string, index: number): number {
  const char = body.charAt(index)
  let end = index
  if (char === '+' || char === '*' || char === '?') {
    end = index + 1
  } else if (char === '{') {
    const bounds = /^\{\d+(?:,\d*)?\}/.exec(body.slice(index))
    if (bounds) end = index + bounds[0].length
  }
  // Lazy suffix
  if (end !== index && body.charAt(end) === '?') end++
  return end
}

// =============================================================================
// Built-in filters
// =============================================================================

const COMPARISON = /^([<>])(-?\d+(?:\.\d+)?)$/

function isEmpty(value: JsonValue): boolean {
  if (isJsonArray(value)) return value.length === 0
  if (isJsonObject(value)) return Object.keys(value).length === 0
  return value === ''
}

function asNumber(value: JsonValue): number {
  if (typeof value === 'number') return value
  if (typeof value === 'string') return parseNumericString(value)
  return Number.NaN
}

function equalsText(value: JsonValue, text: string): boolean {
  if (value === null) return text === 'null'
  if (typeof value === 'boolean') return text === String(value)
  if (typeof value === 'number' || typeof value === 'string') return looseScalarEquals(value, text)
  return false
}

function builtinFilter(source: string, pattern: string): BuiltinFilter | undefined {
  switch (source) {
    case 'empty':
      return { types: ['array', 'string'], test: isEmpty }
    case 'url':
    case 'date':
    case 'email': {
      const validate = FORMAT_VALIDATORS[source]
      return { types: ['string'], test: (value) => typeof value === 'string' && validate(value) }
    }
  }

  const comparison = COMPARISON.exec(source)
  if (comparison) {
    const [, operator, limitText = ''] = comparison
    const limit = Number(limitText)
    return {
      types: ['integer', 'float', 'string'],
      test: (value) => {
        const actual = asNumber(value)
        return operator === '>' ? actual > limit : actual < limit
      },
    }
  }

  if (source.startsWith('regex(') && source.endsWith(')')) {
    const regex = parseDelimitedRegex(source.slice('regex('.length, -1).trim(), pattern)
    return { types: ['string'], test: (value) => typeof value === 'string' && regex.test(value) }
  }

  if (source.startsWith('=')) {
    const text = source.slice(1)
    return { test: (value) => equalsText(value, text) }
  }

  return undefined
}

/**
 * Compile one `:filter` segment for the type it follows.
 * Custom filters are looked up before the built-in ones.
 */
export function compileFilter(
  source: string,
  type: JsonTypeName,
  registry: JsonTypeFilters,
  pattern: string
): CompiledFilter {
  if (source.startsWith('!')) {
    const inner = compileFilter(source.slice(1).trim(), type, registry, pattern)
    return { source, test: (value) => !inner.test(value) }
  }

  const custom = registry.resolve(source)
  if (custom) return custom

  const builtin = builtinFilter(source, pattern)
  if (!builtin) {
    throw new UnsupportedPatternError(pattern, `Unknown filter \`${source}\``)
  }
  if (builtin.types && !builtin.types.includes(type)) {
    throw new UnsupportedPatternError(pattern, `Filter \`${source}\` cannot be applied to type \`${type}\``)
  }

  return { source, test: builtin.test }
}

// =============================================================================
// Custom filter registry
// =============================================================================

interface PatternFilter {
  readonly pattern: RegExp
  readonly fn: FilterFunction
}

/**
 * Custom filters, registered either by exact name (`string:slug`) or by a
 * regular expression whose captures are passed to the filter as arguments
 * (`/^len\((\d+)\)$/` → `string:len(3)` calls `fn(value, '3')`).
 */
export class JsonTypeFilters {
  private readonly named = new Map<string, FilterFunction>()
  private readonly patterns: PatternFilter[] = []

  register(name: string | RegExp, fn: FilterFunction): this {
    if (typeof name === 'string') {
      if (name.trim() === '' || /[:|]/.test(name)) {
        throw new JsonAssertError(`Filter name "${name}" cannot be used in a pattern`, ErrorCode.CONFIG_ERROR)
      }
      this.named.set(name, fn)
      return this
    }

    this.patterns.push({ pattern: new RegExp(name.source, name.flags.replace(/[gy]/g, '')), fn })
    return this
  }

  resolve(source: string): CompiledFilter | undefined {
    const named = this.named.get(source)
    if (named) {
      return { source, test: (value) => named(value) }
    }

    for (const { pattern, fn } of this.patterns) {
      const match = pattern.exec(source)
      if (match) {
        const args = match.slice(1).map((capture) => capture ?? '')
        return { source, test: (value) => fn(value, ...args) }
      }
    }

    return undefined
  }

  get size(): number {
    return this.named.size + this.patterns.length
  }

  clear(): void {
    this.named.clear()
    this.patterns.length = 0
  }
}
