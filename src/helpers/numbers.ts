/**
 * Numeric text helpers shared by the projector, the XPath front end and
 * the loose equality rules.
 */

const NUMERIC_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

const EXPONENT_FORM = /^(-?)(\d+)(?:\.(\d+))?e([+-]?\d+)$/i

/**
 * Whether a string is a plain numeric literal (no whitespace, no hex)
 */
export function isNumericString(value: string): boolean {
  return NUMERIC_LITERAL.test(value)
}

/**
 * Parse a numeric literal, or NaN when the string is not one
 */
export function parseNumericString(value: string): number {
  return isNumericString(value) ? Number(value) : Number.NaN
}

/**
 * Canonical decimal text of a number, never in exponent notation:
 * 1e21 -> "1000000000000000000000", 1.5e-7 -> "0.00000015"
 */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return '0'
  return expandExponent(String(value))
}

/**
 * Rewrite `-1.278E+2` style text into `-127.8`; plain decimals pass through
 */
export function expandExponent(text: string): string {
  const match = EXPONENT_FORM.exec(text)
  if (!match) return text

  const [, sign = '', integer = '', fraction = '', exponentText = '0'] = match
  const exponent = Number.parseInt(exponentText, 10)
  const digits = integer + fraction
  const point = integer.length + exponent

  let result: string
  if (point <= 0) {
    result = `0.${'0'.repeat(-point)}${digits}`
  } else if (point >= digits.length) {
    result = digits + '0'.repeat(point - digits.length)
  } else {
    result = `${digits.slice(0, point)}.${digits.slice(point)}`
  }

  return sign + trimZeros(result)
}

function trimZeros(text: string): string {
  let result = text
  if (result.includes('.')) {
    result = result.replace(/0+$/, '').replace(/\.$/, '')
  }
  result = result.replace(/^0+(?=\d)/, '')
  return result === '' ? '0' : result
}
