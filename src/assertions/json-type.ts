/**
 * Type pattern matching
 */

import type { JsonTypeName, JsonTypeSpec, JsonValue, MatchResult } from '../types.js'
import { compactJson, getOwn, isJsonArray, isJsonObject } from '../value.js'
import { JsonTypeFilters } from './filters.js'
import { compileJsonType, type CompiledJsonType, type CompiledTypePattern } from './json-type-parser.js'

export interface JsonTypeOptions {
  /** Custom filters the pattern may use */
  filters?: JsonTypeFilters
}

/**
 * Pattern type of a value. Objects count as `array`, as do lists.
 */
export function typeOfJson(value: JsonValue): JsonTypeName {
  if (value === null) return 'null'
  if (typeof value === 'boolean') return 'boolean'
  if (typeof value === 'string') return 'string'
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float'
  return 'array'
}

function matchesPattern(value: JsonValue, pattern: CompiledTypePattern): boolean {
  const type = typeOfJson(value)
  return pattern.alternatives.some(
    (alternative) => alternative.type === type && alternative.filters.every((filter) => filter.test(value))
  )
}

/**
 * Failure message for one value, or undefined when it matches
 */
function checkValue(value: JsonValue, compiled: CompiledJsonType, key?: string): string | undefined {
  if (compiled.kind === 'pattern') {
    if (matchesPattern(value, compiled)) return undefined
    const subject = key === undefined ? compactJson(value) : `${key}: ${compactJson(value)}`
    return `\`${subject}\` is not of type \`${compiled.source}\``
  }

  for (const [name, nested] of compiled.keys) {
    const actual = isJsonObject(value) ? getOwn(value, name) : undefined
    if (actual === undefined) {
      return `Key \`${name}\` doesn't exist in ${compactJson(value)}`
    }

    const failure = checkValue(actual, nested, name)
    if (failure !== undefined) return failure
  }

  return undefined
}

/**
 * Match a value against a type pattern or a key → pattern mapping.
 * A non-empty list is matched element by element.
 */
export function matchesJsonType(value: JsonValue, spec: JsonTypeSpec, options: JsonTypeOptions = {}): MatchResult {
  const compiled = compileJsonType(spec, options.filters)
  const items = isJsonArray(value) && value.length > 0 ? value : [value]

  const failures: string[] = []
  for (const item of items) {
    const failure = checkValue(item, compiled)
    if (failure !== undefined) failures.push(failure)
  }

  if (failures.length > 0) {
    return { passed: false, message: failures.join('\n') }
  }
  return { passed: true }
}

export function dontMatchJsonType(value: JsonValue, spec: JsonTypeSpec, options: JsonTypeOptions = {}): MatchResult {
  const result = matchesJsonType(value, spec, options)
  if (result.passed) {
    return { passed: false, message: `Unexpectedly response matched: ${compactJson(value)}` }
  }
  return { passed: true }
}
