/**
 * Containment - deep subset matching of a needle inside a haystack
 */

import { isNumericString } from '../helpers/numbers.js'
import type { JsonArray, JsonObject, JsonScalar, JsonValue } from '../types.js'
import { childValues, getOwn, isJsonArray, isJsonObject, isJsonScalar } from '../value.js'

// =============================================================================
// Loose equality
// =============================================================================

/**
 * Scalar equality where a number and a numeric string with the same value
 * are equal (`27` ~ `"27"`, `27` ~ `"27.0"`). Two strings compare exactly;
 * booleans and null only equal themselves.
 *
 * Numbers are doubles: integers beyond 2^53 are rounded when the body is
 * decoded, so neighbouring large integers compare equal.
 */
export function looseScalarEquals(a: JsonScalar, b: JsonScalar): boolean {
  if (a === b) return true
  if (typeof a === 'number' && typeof b === 'string') return numberEqualsText(a, b)
  if (typeof a === 'string' && typeof b === 'number') return numberEqualsText(b, a)
  return false
}

function numberEqualsText(value: number, text: string): boolean {
  return isNumericString(text) && Number(text) === value
}

// =============================================================================
// Traversal
// =============================================================================

/**
 * Whether the predicate holds for the value itself or any value nested in it
 */
function someNode(value: JsonValue, predicate: (node: JsonValue) => boolean): boolean {
  if (predicate(value)) return true
  return childValues(value).some((child) => someNode(child, predicate))
}

// =============================================================================
// Containment
// =============================================================================

/**
 * A nested scalar must equal the value at its own position; only
 * containers are searched further down
 */
function valueMatches(actual: JsonValue, expected: JsonValue): boolean {
  if (isJsonScalar(expected)) {
    return isJsonScalar(actual) && looseScalarEquals(actual, expected)
  }
  return containsJson(actual, expected)
}

function objectContains(object: JsonObject, needle: JsonObject): boolean {
  return Object.entries(needle).every(([key, expected]) => {
    const actual = getOwn(object, key)
    return actual !== undefined && valueMatches(actual, expected)
  })
}

function listContains(list: JsonArray, needle: JsonArray): boolean {
  return needle.every((expected) => list.some((item) => valueMatches(item, expected)))
}

/**
 * Whether `needle` is contained anywhere in `haystack`.
 *
 * - Object needle: some object in the haystack has every needle key; a
 *   scalar value must equal the value under that key, a container value
 *   must be contained in it
 * - List needle: some list in the haystack matches every needle element
 *   with one of its own elements, in any order
 * - Scalar needle: some scalar in the haystack is loosely equal to it
 */
export function containsJson(haystack: JsonValue, needle: JsonValue): boolean {
  if (isJsonObject(needle)) {
    return someNode(haystack, (node) => isJsonObject(node) && objectContains(node, needle))
  }

  if (isJsonArray(needle)) {
    if (needle.length === 0) return true
    return someNode(haystack, (node) => isJsonArray(node) && listContains(node, needle))
  }

  return someNode(haystack, (node) => isJsonScalar(node) && looseScalarEquals(node, needle))
}
