import { describe, it, expect } from 'vitest'
import { DecodeError, JsonDocument, JsonTypeFilters, createSilentLogger, type Logger } from '../src/index.js'

function recordingLogger(): Logger & { messages: string[] } {
  const messages: string[] = []
  const record = (message: string): void => {
    messages.push(message)
  }
  return { messages, debug: record, info: record, warn: record, error: record }
}

const quiet = { logger: createSilentLogger() }

describe('JsonDocument', () => {
  describe('decoding', () => {
    it('keeps containers as decoded', () => {
      expect(new JsonDocument('{"a":[1,2]}', quiet).toValue()).toEqual({ a: [1, 2] })
    })

    it('wraps bare literals in a list', () => {
      expect(new JsonDocument('5', quiet).value).toEqual([5])
      expect(new JsonDocument('null', quiet).value).toEqual([null])
    })

    it('rejects empty and malformed text', () => {
      expect(() => new JsonDocument('', quiet)).toThrow('Invalid json: . System message: Syntax error: empty input.')
      expect(() => new JsonDocument('[1,', quiet)).toThrow(DecodeError)
    })

    it('freezes the decoded value', () => {
      expect(Object.isFrozen(new JsonDocument('{"a":{"b":1}}', quiet).value)).toBe(true)
    })
  })

  describe('fromValue', () => {
    it('builds a document from a literal', () => {
      expect(JsonDocument.fromValue({ id: 1, tags: ['x'] }, quiet).getXmlString()).toBe(
        '<root><id type="number">1</id><tags type="string">x</tags></root>'
      )
    })

    it('rejects values JSON cannot carry', () => {
      expect(() => JsonDocument.fromValue({ when: new Date(0) }, quiet)).toThrow(
        'Invalid value at $.when: only plain objects can be represented'
      )
    })
  })

  describe('projection', () => {
    it('builds the tree once', () => {
      const document = new JsonDocument('{"a":1}', quiet)

      expect(document.toXml()).toBe(document.toXml())
    })

    it('uses the configured root tag', () => {
      expect(new JsonDocument('{"a":1,"b":2}', { ...quiet, rootTag: 'body' }).getXmlString()).toBe(
        '<body><a type="number">1</a><b type="number">2</b></body>'
      )
    })

    it('exposes placeholder tags', () => {
      const document = new JsonDocument('{"first name":1,"x":2}', { ...quiet, invalidTagPrefix: 'key' })

      expect([...document.invalidTags]).toEqual([['first name', 'key1']])
      expect(document.filterByXPath('//key1')).toHaveLength(1)
    })

    it('logs queries and placeholders at debug level', () => {
      const logger = recordingLogger()
      const document = new JsonDocument('{"first name":1,"x":2}', { logger })

      document.filterByJsonPath('$.x')
      document.filterByXPath('//x')

      expect(logger.messages).toEqual([
        'JSONPath $.x',
        'XPath //x',
        'projecting document to XML',
        'invalidTag1 is "first name"',
      ])
    })
  })

  describe('queries', () => {
    const document = new JsonDocument('{"items":[{"sku":"A1","qty":2},{"sku":"B2","qty":0}]}', quiet)

    it('filters by JSONPath', () => {
      expect(document.filterByJsonPath('$.items[?(@.qty > 0)].sku')).toEqual(['A1'])
    })

    it('filters by XPath', () => {
      expect(document.filterByXPath('//items[qty=0]/sku')).toHaveLength(1)
    })

    it('evaluates XPath expressions', () => {
      expect(document.evaluateXPath('sum(//qty)')).toBe(2)
    })

    it('checks containment', () => {
      expect(document.containsJson({ sku: 'B2' })).toBe(true)
      expect(document.containsJson({ sku: 'C3' })).toBe(false)
    })

    it('matches type patterns at a JSONPath', () => {
      expect(document.matchesJsonType({ sku: 'string', qty: 'integer' }, '$.items[*]')).toEqual({ passed: true })
      expect(document.dontMatchJsonType({ qty: 'integer:>0' }, '$.items[*]')).toEqual({ passed: true })
    })

    it('uses the configured filters', () => {
      const filters = new JsonTypeFilters().register('sku', (value) => typeof value === 'string' && /^[A-Z]\d$/.test(value))
      const withFilters = new JsonDocument('{"sku":"A1"}', { ...quiet, filters })

      expect(withFilters.matchesJsonType({ sku: 'string:sku' })).toEqual({ passed: true })
    })
  })
})
