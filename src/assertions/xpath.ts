/**
 * XPath 1.0 evaluation over a projected JSON tree
 */

import xpath from 'xpath'
import { QueryError } from '../errors.js'
import { expandExponent } from '../helpers/numbers.js'
import type { XPathValue } from '../types.js'
import type { JsonTree } from './projection.js'

const EXPONENT_LITERAL = /^(?:\d+(?:\.\d*)?|\.\d+)[eE][+-]?\d+/
const WORD_CHAR = /[\w.:\u00B7-\uFFFF]/

// `a-1e5` is one name; `. -1e5` and `(-1e5` are numbers
function continuesName(expression: string, index: number): boolean {
  const previous = expression.charAt(index - 1)
  if (previous === '-') {
    return WORD_CHAR.test(expression.charAt(index - 2))
  }
  return WORD_CHAR.test(previous)
}

/**
 * Rewrite scientific-notation number literals (outside string literals)
 * into plain decimals, which XPath 1.0 can read: `-1.278E+2` -> `-127.8`
 */
export function expandNumberLiterals(expression: string): string {
  let result = ''
  let i = 0

  while (i < expression.length) {
    const char = expression.charAt(i)

    if (char === '"' || char === "'") {
      const end = expression.indexOf(char, i + 1)
      const stop = end === -1 ? expression.length : end + 1
      result += expression.slice(i, stop)
      i = stop
      continue
    }

    if (!continuesName(expression, i)) {
      const match = EXPONENT_LITERAL.exec(expression.slice(i))
      const literal = match?.[0]
      const after = literal === undefined ? '' : expression.charAt(i + literal.length)
      if (literal !== undefined && !WORD_CHAR.test(after) && after !== '-') {
        result += expandExponent(Number(literal).toString())
        i += literal.length
        continue
      }
    }

    result += char
    i++
  }

  return result
}

/**
 * Evaluate an expression and return whichever XPath result category it produces
 */
export function evaluateXPath(tree: JsonTree, expression: string): XPathValue {
  const normalized = expandNumberLiterals(expression)

  let result: Node[] | Node | string | number | boolean | null
  try {
    result = xpath.select(normalized, tree.document)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new QueryError('xpath', expression, reason, { cause: error })
  }

  if (Array.isArray(result)) return result
  if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') {
    return result
  }
  return result === null ? [] : [result]
}

/**
 * Evaluate an expression that must select a node-set
 */
export function filterByXPath(tree: JsonTree, expression: string): Node[] {
  const result = evaluateXPath(tree, expression)
  if (!Array.isArray(result)) {
    throw new QueryError('xpath', expression, `expression evaluates to a ${typeof result}, not a node-set`)
  }
  return result
}

/**
 * Text content of the nodes an expression selects
 */
export function textOfNodes(nodes: readonly Node[]): string[] {
  return nodes.map((node) => node.textContent ?? '')
}
