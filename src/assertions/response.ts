/**
 * Assertion verbs over a raw JSON response body.
 * Every verb returns a MatchResult; pass it to `assertPassed` to throw on failure.
 */

import type { AnySchema } from 'ajv'
import { DecodeError, ErrorCode, JsonAssertError } from '../errors.js'
import type { JsonAssertOptions } from '../config.js'
import { JsonDocument } from '../document.js'
import { lazy } from '../helpers/lazy.js'
import type { JsonScalar, JsonTypeSpec, JsonValue, MatchResult, XPathValue } from '../types.js'
import { compactJson, decodeJson, isJsonObject, toJsonValue } from '../value.js'
import { looseScalarEquals } from './contains.js'
import { matchSchema } from './schema.js'

const PASSED: MatchResult = Object.freeze({ passed: true })

function fail(message: string): MatchResult {
  return { passed: false, message }
}

function xpathValueEquals(actual: XPathValue, expected: JsonScalar): boolean {
  if (Array.isArray(actual)) return false
  return looseScalarEquals(actual, expected)
}

function toSchema(value: JsonValue): AnySchema {
  if (typeof value === 'boolean' || isJsonObject(value)) {
    return value
  }
  throw new JsonAssertError(
    `Invalid schema: expected an object or a boolean, got ${compactJson(value)}`,
    ErrorCode.INVALID_SCHEMA
  )
}

export class JsonResponseAssertions {
  private readonly document: () => JsonDocument

  /**
   * Verbs other than `seeResponseIsJson` throw DecodeError when the body is not JSON
   */
  constructor(
    readonly body: string,
    options: JsonAssertOptions = {}
  ) {
    this.document = lazy(() => new JsonDocument(body, options))
  }

  private withBody(message: string): string {
    return `${message}\nJson Response: \n${this.body}`
  }

  seeResponseIsJson(): MatchResult {
    if (this.body === '') return fail('response is empty')

    try {
      this.document()
      return PASSED
    } catch (error) {
      if (error instanceof DecodeError) return fail(error.message)
      throw error
    }
  }

  seeResponseContainsJson(json: JsonValue = []): MatchResult {
    const document = this.document()
    if (document.containsJson(json)) return PASSED
    return fail(
      'Response JSON does not contain the provided JSON\n' +
        `- ${compactJson(toJsonValue(json))}\n` +
        `+ ${compactJson(document.value)}`
    )
  }

  dontSeeResponseContainsJson(json: JsonValue = []): MatchResult {
    const document = this.document()
    if (!document.containsJson(json)) return PASSED
    return fail(
      'Response JSON contains provided JSON\n' +
        `- ${compactJson(toJsonValue(json))}\n` +
        `+ ${compactJson(document.value)}`
    )
  }

  seeResponseJsonMatchesXpath(xpath: string): MatchResult {
    if (this.document().filterByXPath(xpath).length > 0) return PASSED
    return fail(this.withBody(`Received JSON did not match the XPath \`${xpath}\`.`))
  }

  dontSeeResponseJsonMatchesXpath(xpath: string): MatchResult {
    if (this.document().filterByXPath(xpath).length === 0) return PASSED
    return fail(this.withBody(`Received JSON matched the XPath \`${xpath}\`.`))
  }

  seeResponseJsonXpathEvaluatesTo(xpath: string, expected: JsonScalar): MatchResult {
    if (xpathValueEquals(this.document().evaluateXPath(xpath), expected)) return PASSED
    return fail(this.withBody(`Received JSON did not evaluate XPath \`${xpath}\` as expected.`))
  }

  dontSeeResponseJsonXpathEvaluatesTo(xpath: string, expected: JsonScalar): MatchResult {
    if (!xpathValueEquals(this.document().evaluateXPath(xpath), expected)) return PASSED
    return fail(this.withBody(`Received JSON did not evaluate XPath \`${xpath}\` as expected.`))
  }

  seeResponseJsonMatchesJsonPath(jsonPath: string): MatchResult {
    if (this.document().filterByJsonPath(jsonPath).length > 0) return PASSED
    return fail(this.withBody(`Received JSON did not match the JsonPath \`${jsonPath}\`.`))
  }

  dontSeeResponseJsonMatchesJsonPath(jsonPath: string): MatchResult {
    if (this.document().filterByJsonPath(jsonPath).length === 0) return PASSED
    return fail(this.withBody(`Received JSON matched the JsonPath \`${jsonPath}\`.`))
  }

  grabDataFromResponseByJsonPath(jsonPath: string): JsonValue[] {
    return this.document().filterByJsonPath(jsonPath)
  }

  seeResponseMatchesJsonType(spec: JsonTypeSpec, jsonPath?: string): MatchResult {
    return this.document().matchesJsonType(spec, jsonPath)
  }

  dontSeeResponseMatchesJsonType(spec: JsonTypeSpec, jsonPath?: string): MatchResult {
    return this.document().dontMatchJsonType(spec, jsonPath)
  }

  /**
   * Validate the body against a JSON Schema given as text
   */
  seeResponseIsValidOnJsonSchemaString(schema: string): MatchResult {
    if (this.body === '') return fail('response is empty')
    // The body as sent, without the `[literal]` wrapper
    const value = decodeJson(this.body)

    if (schema === '') return fail('schema is empty')
    let schemaValue: JsonValue
    try {
      schemaValue = decodeJson(schema, 'Invalid schema json: %s. System message: %s.')
    } catch (error) {
      if (error instanceof DecodeError) return fail(error.message)
      throw error
    }

    return matchSchema(value, toSchema(schemaValue))
  }
}
