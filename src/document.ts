/**
 * JsonDocument - a decoded response body and every query over it
 */

import { resolveConfig, type JsonAssertConfig, type JsonAssertOptions } from './config.js'
import { lazy } from './helpers/lazy.js'
import { containsJson } from './assertions/contains.js'
import { dontMatchJsonType, matchesJsonType } from './assertions/json-type.js'
import { queryJsonPath } from './assertions/jsonpath.js'
import { projectJson, serializeTree, type JsonTree } from './assertions/projection.js'
import { evaluateXPath, filterByXPath } from './assertions/xpath.js'
import type { JsonContainer, JsonTypeSpec, JsonValue, MatchResult, XPathValue } from './types.js'
import { compactJson, decodeDocument, toJsonValue } from './value.js'

export class JsonDocument {
  /** Decoded body; bare literals are wrapped as `[literal]` */
  readonly value: JsonContainer
  readonly config: JsonAssertConfig
  private readonly tree: () => JsonTree

  /**
   * @throws DecodeError when `text` is empty or not valid JSON
   */
  constructor(text: string, options: JsonAssertOptions = {}) {
    this.config = resolveConfig(options)
    this.value = decodeDocument(text)
    this.tree = lazy(() => {
      const { rootTag, invalidTagPrefix, logger } = this.config
      logger.debug('projecting document to XML')
      return projectJson(this.value, { rootTag, invalidTagPrefix, logger })
    })
  }

  /**
   * Wrap a value built in code rather than read from a body
   */
  static fromValue(value: unknown, options: JsonAssertOptions = {}): JsonDocument {
    return new JsonDocument(compactJson(toJsonValue(value)), options)
  }

  toValue(): JsonContainer {
    return this.value
  }

  /**
   * Projected tree, built on first use and shared by every later query
   */
  toXml(): JsonTree {
    return this.tree()
  }

  getXmlString(): string {
    return serializeTree(this.tree())
  }

  /** Original key → placeholder tag, for keys that are not valid element names */
  get invalidTags(): ReadonlyMap<string, string> {
    return this.tree().invalidTags
  }

  filterByXPath(expression: string): Node[] {
    this.config.logger.debug(`XPath ${expression}`)
    return filterByXPath(this.tree(), expression)
  }

  evaluateXPath(expression: string): XPathValue {
    this.config.logger.debug(`XPath ${expression}`)
    return evaluateXPath(this.tree(), expression)
  }

  filterByJsonPath(expression: string): JsonValue[] {
    this.config.logger.debug(`JSONPath ${expression}`)
    return queryJsonPath(this.value, expression)
  }

  containsJson(needle: JsonValue): boolean {
    return containsJson(this.value, toJsonValue(needle))
  }

  /**
   * Match the document, or the values a JSONPath selects, against a type pattern
   */
  matchesJsonType(spec: JsonTypeSpec, jsonPath?: string): MatchResult {
    return matchesJsonType(this.inspected(jsonPath), spec, { filters: this.config.filters })
  }

  dontMatchJsonType(spec: JsonTypeSpec, jsonPath?: string): MatchResult {
    return dontMatchJsonType(this.inspected(jsonPath), spec, { filters: this.config.filters })
  }

  private inspected(jsonPath?: string): JsonValue {
    return jsonPath ? this.filterByJsonPath(jsonPath) : this.value
  }
}
