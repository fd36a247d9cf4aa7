/**
 * JSONPath expression evaluator
 * Supports `$.data.user.name`, `$['data']["user"]`, `$.items[0].id`, `$..id`,
 * `$.items[*]`, `$.items[-1]`, `$.items[0,2]`, `$.items[1:3]` and filters
 * such as `$.items[?(@.price < 10 && @.tags)]`
 */

import { QueryError } from '../errors.js'
import type { JsonScalar, JsonValue } from '../types.js'
import { childValues, deepEqual, getOwn, isJsonArray, isJsonObject } from '../value.js'

// =============================================================================
// Syntax tree
// =============================================================================

export type Selector =
  | { kind: 'name'; name: string }
  | { kind: 'wildcard' }
  | { kind: 'index'; index: number }
  | { kind: 'slice'; start?: number; end?: number; step?: number }
  | { kind: 'filter'; expression: FilterExpression }

export interface Segment {
  descendant: boolean
  selectors: Selector[]
}

export interface PathQuery {
  /** `$` addresses the document root, `@` the node under test */
  root: '$' | '@'
  segments: Segment[]
}

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>='

export type Comparable = { kind: 'literal'; value: JsonScalar } | { kind: 'query'; query: PathQuery }

export type FilterExpression =
  | { kind: 'or'; left: FilterExpression; right: FilterExpression }
  | { kind: 'and'; left: FilterExpression; right: FilterExpression }
  | { kind: 'not'; operand: FilterExpression }
  | { kind: 'comparison'; operator: ComparisonOperator; left: Comparable; right: Comparable }
  | { kind: 'exists'; query: PathQuery }

// =============================================================================
// Parser
// =============================================================================

const NAME_FIRST = /[A-Za-z_$\u0080-\uFFFF]/
const NAME_CHAR = /[A-Za-z0-9_$\-\u0080-\uFFFF]/
const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['==', '!=', '<=', '>=', '<', '>']
const ESCAPES: Record<string, string> = {
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  '/': '/',
  '\\': '\\',
  "'": "'",
  '"': '"',
}

class JsonPathParser {
  private pos = 0

  constructor(
    private readonly expression: string,
    private readonly text: string
  ) {}

  parse(): PathQuery {
    this.skipWhitespace()
    if (this.peek() !== '$') {
      this.fail('expected `$`')
    }
    this.pos++

    const query: PathQuery = { root: '$', segments: this.parseSegments() }

    this.skipWhitespace()
    if (this.pos < this.text.length) {
      this.fail(`unexpected \`${this.peek()}\``)
    }
    return query
  }

  private parseSegments(): Segment[] {
    const segments: Segment[] = []

    for (;;) {
      const char = this.peek()

      if (char === '.' && this.text.charAt(this.pos + 1) === '.') {
        this.pos += 2
        segments.push({ descendant: true, selectors: this.parseSegmentBody(true) })
      } else if (char === '.') {
        this.pos++
        segments.push({ descendant: false, selectors: this.parseSegmentBody(false) })
      } else if (char === '[') {
        segments.push({ descendant: false, selectors: this.parseBracket() })
      } else {
        return segments
      }
    }
  }

  private parseSegmentBody(descendant: boolean): Selector[] {
    const char = this.peek()
    if (char === '*') {
      this.pos++
      return [{ kind: 'wildcard' }]
    }
    if (descendant && char === '[') {
      return this.parseBracket()
    }
    return [{ kind: 'name', name: this.parseName() }]
  }

  private parseName(): string {
    const start = this.pos
    if (!NAME_FIRST.test(this.peek()) && !/\d/.test(this.peek())) {
      this.fail('expected a member name')
    }
    while (this.pos < this.text.length && NAME_CHAR.test(this.peek())) {
      this.pos++
    }
    return this.text.slice(start, this.pos)
  }

  private parseBracket(): Selector[] {
    this.expect('[')
    const selectors: Selector[] = []

    for (;;) {
      this.skipWhitespace()
      selectors.push(this.parseSelector())
      this.skipWhitespace()

      if (this.peek() === ',') {
        this.pos++
        continue
      }
      this.expect(']')
      return selectors
    }
  }

  private parseSelector(): Selector {
    const char = this.peek()

    if (char === "'" || char === '"') {
      return { kind: 'name', name: this.parseString() }
    }
    if (char === '*') {
      this.pos++
      return { kind: 'wildcard' }
    }
    if (char === '?') {
      this.pos++
      this.skipWhitespace()
      return { kind: 'filter', expression: this.parseOr() }
    }

    const start = this.parseOptionalInteger()
    this.skipWhitespace()
    if (this.peek() !== ':') {
      if (start === undefined) {
        return this.fail(char === '' ? 'unexpected end of expression' : `unexpected \`${char}\``)
      }
      return { kind: 'index', index: start }
    }

    this.pos++
    this.skipWhitespace()
    const end = this.parseOptionalInteger()
    this.skipWhitespace()
    let step: number | undefined
    if (this.peek() === ':') {
      this.pos++
      this.skipWhitespace()
      step = this.parseOptionalInteger()
    }
    return { kind: 'slice', start, end, step }
  }

  private parseOptionalInteger(): number | undefined {
    const match = /^-?\d+/.exec(this.text.slice(this.pos))
    if (!match) return undefined
    this.pos += match[0].length
    return Number.parseInt(match[0], 10)
  }

  private parseString(): string {
    const quote = this.peek()
    this.pos++
    let result = ''

    while (this.pos < this.text.length) {
      const char = this.peek()
      this.pos++

      if (char === quote) return result
      if (char !== '\\') {
        result += char
        continue
      }

      const escaped = this.peek()
      this.pos++
      if (escaped === 'u') {
        const hex = this.text.slice(this.pos, this.pos + 4)
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) this.fail('invalid unicode escape')
        result += String.fromCharCode(Number.parseInt(hex, 16))
        this.pos += 4
        continue
      }
      const replacement = ESCAPES[escaped]
      if (replacement === undefined) return this.fail(`invalid escape \`\\${escaped}\``)
      result += replacement
    }

    return this.fail('unterminated string')
  }

  // Filter expressions

  private parseOr(): FilterExpression {
    let left = this.parseAnd()
    while (this.consume('||')) {
      left = { kind: 'or', left, right: this.parseAnd() }
    }
    return left
  }

  private parseAnd(): FilterExpression {
    let left = this.parseUnary()
    while (this.consume('&&')) {
      left = { kind: 'and', left, right: this.parseUnary() }
    }
    return left
  }

  private parseUnary(): FilterExpression {
    this.skipWhitespace()
    if (this.peek() === '!' && this.text.charAt(this.pos + 1) !== '=') {
      this.pos++
      return { kind: 'not', operand: this.parseUnary() }
    }
    if (this.peek() === '(') {
      this.pos++
      const inner = this.parseOr()
      this.skipWhitespace()
      this.expect(')')
      return inner
    }
    return this.parseComparison()
  }

  private parseComparison(): FilterExpression {
    const left = this.parseComparable()
    this.skipWhitespace()

    const operator = COMPARISON_OPERATORS.find((candidate) => this.text.startsWith(candidate, this.pos))
    if (operator === undefined) {
      if (left.kind === 'literal') {
        return this.fail('a literal must be compared with something')
      }
      return { kind: 'exists', query: left.query }
    }

    this.pos += operator.length
    this.skipWhitespace()
    return { kind: 'comparison', operator, left, right: this.parseComparable() }
  }

  private parseComparable(): Comparable {
    this.skipWhitespace()
    const char = this.peek()

    if (char === '@' || char === '$') {
      this.pos++
      return { kind: 'query', query: { root: char === '@' ? '@' : '$', segments: this.parseSegments() } }
    }
    if (char === "'" || char === '"') {
      return { kind: 'literal', value: this.parseString() }
    }

    const number = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/.exec(this.text.slice(this.pos))
    if (number) {
      this.pos += number[0].length
      return { kind: 'literal', value: Number(number[0]) }
    }

    for (const [word, value] of [
      ['true', true],
      ['false', false],
      ['null', null],
    ] as const) {
      if (this.text.startsWith(word, this.pos) && !NAME_CHAR.test(this.text.charAt(this.pos + word.length))) {
        this.pos += word.length
        return { kind: 'literal', value }
      }
    }

    return this.fail(char === '' ? 'unexpected end of expression' : `unexpected \`${char}\``)
  }

  // Helpers

  private peek(): string {
    return this.text.charAt(this.pos)
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.peek()) && this.pos < this.text.length) this.pos++
  }

  private consume(token: string): boolean {
    this.skipWhitespace()
    if (!this.text.startsWith(token, this.pos)) return false
    this.pos += token.length
    return true
  }

  private expect(token: string): void {
    if (!this.text.startsWith(token, this.pos)) {
      this.fail(this.pos >= this.text.length ? `expected \`${token}\` before end of expression` : `expected \`${token}\``)
    }
    this.pos += token.length
  }

  private fail(reason: string): never {
    throw new QueryError('jsonpath', this.expression, `${reason} at position ${this.pos}`)
  }
}

/**
 * Parse a JSONPath expression. A path without a leading `$` is read from
 * the root: `data.items[0]` is `$.data.items[0]`.
 */
export function parseJsonPath(expression: string): PathQuery {
  const trimmed = expression.trim()
  let text = trimmed
  if (!trimmed.startsWith('$')) {
    text = trimmed.startsWith('.') || trimmed.startsWith('[') ? `$${trimmed}` : `$.${trimmed}`
  }
  return new JsonPathParser(expression, text).parse()
}

// =============================================================================
// Evaluation
// =============================================================================

/** Value, or `undefined` for nothing */
type Operand = JsonValue | undefined

function descendants(value: JsonValue): JsonValue[] {
  const result: JsonValue[] = [value]
  for (const child of childValues(value)) {
    result.push(...descendants(child))
  }
  return result
}

function normalizeIndex(index: number, length: number): number {
  return index < 0 ? length + index : index
}

function sliceList(list: readonly JsonValue[], start?: number, end?: number, step = 1): JsonValue[] {
  const length = list.length
  const result: JsonValue[] = []
  if (step === 0) return result

  const clamp = (value: number, low: number, high: number): number => Math.min(Math.max(value, low), high)

  if (step > 0) {
    const lower = clamp(normalizeIndex(start ?? 0, length), 0, length)
    const upper = clamp(normalizeIndex(end ?? length, length), 0, length)
    for (let i = lower; i < upper; i += step) {
      const item = list[i]
      if (item !== undefined) result.push(item)
    }
  } else {
    const upper = clamp(normalizeIndex(start ?? length - 1, length), -1, length - 1)
    const lower = end === undefined ? -1 : clamp(normalizeIndex(end, length), -1, length - 1)
    for (let i = upper; i > lower; i += step) {
      const item = list[i]
      if (item !== undefined) result.push(item)
    }
  }

  return result
}

function select(node: JsonValue, selector: Selector, root: JsonValue): JsonValue[] {
  switch (selector.kind) {
    case 'name': {
      if (!isJsonObject(node)) return []
      const value = getOwn(node, selector.name)
      return value === undefined ? [] : [value]
    }
    case 'wildcard':
      return [...childValues(node)]
    case 'index': {
      if (!isJsonArray(node)) return []
      const value = node[normalizeIndex(selector.index, node.length)]
      return value === undefined ? [] : [value]
    }
    case 'slice':
      return isJsonArray(node) ? sliceList(node, selector.start, selector.end, selector.step) : []
    case 'filter':
      return childValues(node).filter((child) => testFilter(selector.expression, child, root))
  }
}

function evaluateQuery(query: PathQuery, current: JsonValue, root: JsonValue): JsonValue[] {
  let nodes: JsonValue[] = [query.root === '$' ? root : current]

  for (const segment of query.segments) {
    const next: JsonValue[] = []
    for (const node of nodes) {
      const targets = segment.descendant ? descendants(node) : [node]
      for (const target of targets) {
        for (const selector of segment.selectors) {
          next.push(...select(target, selector, root))
        }
      }
    }
    nodes = next
  }

  return nodes
}

function operandOf(comparable: Comparable, current: JsonValue, root: JsonValue): Operand {
  if (comparable.kind === 'literal') return comparable.value
  const nodes = evaluateQuery(comparable.query, current, root)
  return nodes.length === 1 ? nodes[0] : undefined
}

function isEqual(left: Operand, right: Operand): boolean {
  if (left === undefined || right === undefined) return left === right
  return deepEqual(left, right)
}

function isLess(left: Operand, right: Operand): boolean {
  if (typeof left === 'number' && typeof right === 'number') return left < right
  if (typeof left === 'string' && typeof right === 'string') return left < right
  return false
}

function compare(operator: ComparisonOperator, left: Operand, right: Operand): boolean {
  switch (operator) {
    case '==':
      return isEqual(left, right)
    case '!=':
      return !isEqual(left, right)
    case '<':
      return isLess(left, right)
    case '<=':
      return isLess(left, right) || isEqual(left, right)
    case '>':
      return isLess(right, left)
    case '>=':
      return isLess(right, left) || isEqual(left, right)
  }
}

function testFilter(expression: FilterExpression, current: JsonValue, root: JsonValue): boolean {
  switch (expression.kind) {
    case 'or':
      return testFilter(expression.left, current, root) || testFilter(expression.right, current, root)
    case 'and':
      return testFilter(expression.left, current, root) && testFilter(expression.right, current, root)
    case 'not':
      return !testFilter(expression.operand, current, root)
    case 'exists':
      return evaluateQuery(expression.query, current, root).length > 0
    case 'comparison':
      return compare(
        expression.operator,
        operandOf(expression.left, current, root),
        operandOf(expression.right, current, root)
      )
  }
}

// =============================================================================
// Main Functions
// =============================================================================

/**
 * Every value the expression selects, in document order
 */
export function queryJsonPath(value: JsonValue, expression: string): JsonValue[] {
  return evaluateQuery(parseJsonPath(expression), value, value)
}
