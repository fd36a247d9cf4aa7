/**
 * Core types for the JSON assertion engine
 */

// =============================================================================
// Value Model
// =============================================================================

export type JsonScalar = null | boolean | number | string

export type JsonArray = readonly JsonValue[]

export interface JsonObject {
  readonly [key: string]: JsonValue
}

export type JsonContainer = JsonArray | JsonObject

export type JsonValue = JsonScalar | JsonArray | JsonObject

// =============================================================================
// Typed patterns
// =============================================================================

/**
 * A type pattern string such as `string|null` or `integer:>0:<100`,
 * or a mapping of keys to nested patterns.
 */
export type JsonTypeSpec = string | JsonTypeShape

export interface JsonTypeShape {
  readonly [key: string]: JsonTypeSpec
}

export type JsonTypeName = 'string' | 'integer' | 'float' | 'array' | 'boolean' | 'null'

// =============================================================================
// Matcher Result
// =============================================================================

export interface MatchResult {
  passed: boolean
  message?: string
}

// =============================================================================
// Query results
// =============================================================================

/**
 * Result categories of XPath 1.0: node-set, string, number, boolean
 */
export type XPathValue = Node[] | string | number | boolean
