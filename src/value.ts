/**
 * Value Model - decoding, conversion and inspection of JSON values
 */

import { DecodeError } from './errors.js'
import type { JsonArray, JsonContainer, JsonObject, JsonScalar, JsonValue } from './types.js'

// =============================================================================
// Type Guards
// =============================================================================

export function isJsonArray(value: JsonValue): value is JsonArray {
  return Array.isArray(value)
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isJsonContainer(value: JsonValue): value is JsonContainer {
  return typeof value === 'object' && value !== null
}

export function isJsonScalar(value: JsonValue): value is JsonScalar {
  return value === null || typeof value !== 'object'
}

/**
 * Direct children of a container in document order
 */
export function childValues(value: JsonValue): JsonArray {
  if (isJsonArray(value)) return value
  if (isJsonObject(value)) return Object.values(value)
  return []
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode JSON text into a frozen value. Fails on the empty string and on
 * any syntax error.
 */
export function decodeJson(text: string, errorFormat?: string): JsonValue {
  if (text.trim() === '') {
    throw new DecodeError(text, 'Syntax error: empty input', errorFormat)
  }

  let decoded: unknown
  try {
    decoded = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new DecodeError(text, reason, errorFormat)
  }

  return deepFreeze(toJsonValue(decoded))
}

/**
 * Decode a response body; bare literals are wrapped in a single-element
 * list so every document is a container.
 */
export function decodeDocument(text: string): JsonContainer {
  return normalizeDocument(decodeJson(text))
}

export function normalizeDocument(value: JsonValue): JsonContainer {
  return isJsonContainer(value) ? value : Object.freeze([value])
}

// =============================================================================
// Conversion boundary
// =============================================================================

/**
 * Normalize an author-supplied literal into the Value Model.
 * Rejects anything JSON cannot carry instead of silently dropping it.
 */
export function toJsonValue(input: unknown, path = '$'): JsonValue {
  if (input === null) return null

  switch (typeof input) {
    case 'string':
    case 'boolean':
      return input
    case 'number':
      if (!Number.isFinite(input)) {
        throw new DecodeError(path, `non-finite number ${input} cannot be represented`, 'Invalid value at %s: %s')
      }
      return input
    case 'object':
      break
    default:
      throw new DecodeError(path, `${typeof input} cannot be represented`, 'Invalid value at %s: %s')
  }

  if (Array.isArray(input)) {
    return input.map((item, index) => toJsonValue(item, `${path}[${index}]`))
  }

  const proto = Object.getPrototypeOf(input)
  if (proto !== Object.prototype && proto !== null) {
    throw new DecodeError(path, 'only plain objects can be represented', 'Invalid value at %s: %s')
  }

  const result: Record<string, JsonValue> = {}
  for (const [key, value] of Object.entries(input)) {
    Object.defineProperty(result, key, {
      value: toJsonValue(value, `${path}.${key}`),
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }
  return result
}

export function deepFreeze<T extends JsonValue>(value: T): T {
  if (isJsonContainer(value) && !Object.isFrozen(value)) {
    for (const child of childValues(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Compact single-line serialization used in diagnostics
 */
export function compactJson(value: JsonValue): string {
  return JSON.stringify(value)
}

export function deepEqual(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true
  if (a === null || b === null) return false
  if (typeof a !== typeof b) return false

  if (isJsonArray(a) || isJsonArray(b)) {
    if (!isJsonArray(a) || !isJsonArray(b)) return false
    if (a.length !== b.length) return false
    return a.every((item, i) => {
      const other = b[i]
      return other !== undefined && deepEqual(item, other)
    })
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)

    if (aKeys.length !== bKeys.length) return false
    return aKeys.every((key) => {
      const other = b[key]
      return Object.hasOwn(b, key) && other !== undefined && deepEqual(a[key] ?? null, other)
    })
  }

  return false
}

/**
 * Own-key lookup that never reaches the prototype chain
 */
export function getOwn(object: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(object, key) ? object[key] : undefined
}
