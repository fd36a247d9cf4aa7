/**
 * Tree projection - renders a JSON value as a type-annotated XML document
 * so it can be queried with XPath.
 *
 * `{"ticket": {"title": "Bug", "labels": null}}` becomes
 * `<ticket><title type="string">Bug</title><labels type="null"></labels></ticket>`
 */

import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom'
import type { JsonContainer, JsonScalar, JsonValue } from '../types.js'
import { isJsonArray, isJsonContainer, isJsonObject, normalizeDocument } from '../value.js'
import { formatNumber } from '../helpers/numbers.js'
import { createSilentLogger, type Logger } from '../logger.js'

// =============================================================================
// Types
// =============================================================================

export interface JsonTree {
  readonly document: Document
  readonly root: Element
  /** Original key → placeholder tag, for keys that are not valid element names */
  readonly invalidTags: ReadonlyMap<string, string>
}

export interface ProjectionOptions {
  rootTag?: string
  invalidTagPrefix?: string
  logger?: Logger
}

export type LeafType = 'boolean' | 'number' | 'null' | 'string'

export const TYPE_ATTRIBUTE = 'type'

// =============================================================================
// Tag names
// =============================================================================

// XML 1.0 NameStartChar / NameChar without ':' so tags stay namespace-free
const NAME_START_CHARS =
  'A-Z_a-z\\u00C0-\\u00D6\\u00D8-\\u00F6\\u00F8-\\u02FF\\u0370-\\u037D\\u037F-\\u1FFF' +
  '\\u200C-\\u200D\\u2070-\\u218F\\u2C00-\\u2FEF\\u3001-\\uD7FF\\uF900-\\uFDCF\\uFDF0-\\uFFFD'
const NAME_CHARS = `${NAME_START_CHARS}\\-.0-9\\u00B7\\u0300-\\u036F\\u203F-\\u2040`
const TAG_NAME = new RegExp(`^[${NAME_START_CHARS}][${NAME_CHARS}]*$`)

export function isValidTagName(name: string): boolean {
  return TAG_NAME.test(name)
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Maps keys to element names. One instance per projection, so the
 * placeholder counter never outlives a single build.
 */
class TagNamer {
  private readonly invalidTags = new Map<string, string>()

  constructor(
    private readonly prefix: string,
    private readonly logger: Logger
  ) {}

  tagFor(key: string): string {
    if (isValidTagName(key)) {
      return key
    }

    let tag = this.invalidTags.get(key)
    if (tag === undefined) {
      tag = `${this.prefix}${this.invalidTags.size + 1}`
      this.invalidTags.set(key, tag)
      this.logger.debug(`${tag} is "${key}"`)
    }
    return tag
  }

  snapshot(): ReadonlyMap<string, string> {
    return new Map(this.invalidTags)
  }
}

class TreeBuilder {
  constructor(
    private readonly document: Document,
    private readonly namer: TagNamer
  ) {}

  appendEntries(parent: Element, value: JsonContainer): void {
    if (isJsonArray(value)) {
      for (const item of value) {
        this.appendChild(parent, parent.tagName, item)
      }
      return
    }

    for (const [key, item] of Object.entries(value)) {
      const tag = this.namer.tagFor(key)
      if (isJsonArray(item) && item.length > 0) {
        // List items repeat the key as sibling elements
        for (const element of item) {
          this.appendChild(parent, tag, element)
        }
      } else {
        this.appendChild(parent, tag, item)
      }
    }
  }

  private appendChild(parent: Element, tag: string, value: JsonValue): void {
    const element = this.document.createElement(tag)
    parent.appendChild(element)

    if (isJsonContainer(value)) {
      this.appendEntries(element, value)
    } else {
      const [type, text] = leafText(value)
      element.setAttribute(TYPE_ATTRIBUTE, type)
      element.appendChild(this.document.createTextNode(text))
    }
  }
}

/**
 * Type tag and canonical text of a leaf
 */
export function leafText(value: JsonScalar): [LeafType, string] {
  if (value === null) return ['null', '']
  if (typeof value === 'boolean') return ['boolean', value ? 'true' : 'false']
  if (typeof value === 'number') return ['number', formatNumber(value)]
  return ['string', value]
}

// =============================================================================
// Main Functions
// =============================================================================

export function projectJson(value: JsonValue, options: ProjectionOptions = {}): JsonTree {
  const namer = new TagNamer(options.invalidTagPrefix ?? 'invalidTag', options.logger ?? createSilentLogger())
  let rootTag = options.rootTag ?? 'root'
  let content: JsonContainer = normalizeDocument(value)

  // A single wrapper key holding a container becomes the root element
  if (isJsonObject(content)) {
    const keys = Object.keys(content)
    const onlyKey = keys[0]
    const inner = onlyKey === undefined ? undefined : content[onlyKey]
    if (keys.length === 1 && onlyKey !== undefined && inner !== undefined && isJsonContainer(inner)) {
      rootTag = namer.tagFor(onlyKey)
      content = inner
    }
  }

  const document = new DOMImplementation().createDocument(null, rootTag, null)
  const root = document.documentElement
  new TreeBuilder(document, namer).appendEntries(root, content)

  return Object.freeze({ document, root, invalidTags: namer.snapshot() })
}

/**
 * XML text of a projected tree, without an XML declaration
 */
export function serializeTree(tree: JsonTree): string {
  return new XMLSerializer().serializeToString(tree.document)
}
