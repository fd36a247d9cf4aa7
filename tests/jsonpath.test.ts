import { describe, it, expect } from 'vitest'
import { QueryError, decodeJson, parseJsonPath, queryJsonPath } from '../src/index.js'

const shop = decodeJson(
  JSON.stringify({
    store: {
      books: [
        { title: 'Alpha', price: 8, tags: ['a'] },
        { title: 'Beta', price: 12.5 },
        { title: 'Gamma', price: 5, isbn: 'x-1' },
      ],
      owner: { name: 'Kim', price: 99 },
    },
  })
)

describe('queryJsonPath', () => {
  describe('member access', () => {
    it('follows dotted names', () => {
      const address = decodeJson('{"address":{"city":"Kyiv"}}')

      expect(queryJsonPath(address, '$.address.city')).toEqual(['Kyiv'])
      expect(queryJsonPath(address, '$.address.street')).toEqual([])
    })

    it('reads paths without a leading $ from the root', () => {
      expect(queryJsonPath(shop, 'store.owner.name')).toEqual(['Kim'])
      expect(queryJsonPath(decodeJson('[10,20]'), '[1]')).toEqual([20])
    })

    it('follows bracketed names in either quote style', () => {
      expect(queryJsonPath(shop, `$['store']["owner"].name`)).toEqual(['Kim'])
    })

    it('unescapes quoted names', () => {
      expect(queryJsonPath(decodeJson('{"it\'s":1}'), "$['it\\'s']")).toEqual([1])
    })

    it('returns the root for $', () => {
      expect(queryJsonPath(shop, '$')).toEqual([shop])
    })
  })

  describe('wildcards and indices', () => {
    it('selects every child', () => {
      expect(queryJsonPath(shop, '$.store.books[*].title')).toEqual(['Alpha', 'Beta', 'Gamma'])
      expect(queryJsonPath(shop, '$.store.*')).toHaveLength(2)
    })

    it('counts negative indices from the end', () => {
      expect(queryJsonPath(shop, '$.store.books[-1].title')).toEqual(['Gamma'])
    })

    it('returns nothing for an index out of range', () => {
      expect(queryJsonPath(shop, '$.store.books[5]')).toEqual([])
    })

    it('selects unions in the order written', () => {
      expect(queryJsonPath(shop, '$.store.books[2,0].title')).toEqual(['Gamma', 'Alpha'])
    })

    it('slices lists', () => {
      expect(queryJsonPath(shop, '$.store.books[1:].title')).toEqual(['Beta', 'Gamma'])
      expect(queryJsonPath(shop, '$.store.books[:2].title')).toEqual(['Alpha', 'Beta'])
      expect(queryJsonPath(shop, '$.store.books[::-1].title')).toEqual(['Gamma', 'Beta', 'Alpha'])
      expect(queryJsonPath(shop, '$.store.books[0:3:2].title')).toEqual(['Alpha', 'Gamma'])
    })
  })

  describe('recursive descent', () => {
    it('collects matches in document order', () => {
      expect(queryJsonPath(shop, '$..price')).toEqual([8, 12.5, 5, 99])
    })

    it('combines with bracket selectors', () => {
      expect(queryJsonPath(shop, '$..books[0].title')).toEqual(['Alpha'])
    })
  })

  describe('filters', () => {
    it('compares against literals', () => {
      expect(queryJsonPath(shop, '$..books[?(@.price < 10)].title')).toEqual(['Alpha', 'Gamma'])
      expect(queryJsonPath(shop, '$.store.books[?(@.price >= 12.5)].title')).toEqual(['Beta'])
    })

    it('tests for existence', () => {
      expect(queryJsonPath(shop, '$.store.books[?(@.isbn)].title')).toEqual(['Gamma'])
      expect(queryJsonPath(shop, '$.store.books[?(!@.tags)].title')).toEqual(['Beta', 'Gamma'])
    })

    it('combines conditions', () => {
      expect(queryJsonPath(shop, '$.store.books[?(@.price > 6 && @.price < 10)].title')).toEqual(['Alpha'])
      expect(queryJsonPath(shop, "$.store.books[?(@.title == 'Beta' || @.price == 5)].title")).toEqual([
        'Beta',
        'Gamma',
      ])
    })

    it('groups with parentheses', () => {
      expect(queryJsonPath(shop, '$.store.books[?(!(@.price > 6) && @.isbn)].title')).toEqual(['Gamma'])
    })

    it('compares against the document root', () => {
      expect(queryJsonPath(shop, '$.store.books[?(@.price < $.store.owner.price)]')).toHaveLength(3)
    })

    it('treats a missing value as unequal to everything', () => {
      expect(queryJsonPath(shop, '$.store.books[?(@.missing == null)]')).toEqual([])
      expect(queryJsonPath(shop, '$.store.books[?(@.missing != 1)]')).toHaveLength(3)
    })

    it('filters object members', () => {
      expect(queryJsonPath(shop, '$.store[?(@.name)]')).toEqual([{ name: 'Kim', price: 99 }])
    })

    it('compares booleans and null', () => {
      const flags = decodeJson('[{"on":true},{"on":false},{"on":null}]')

      expect(queryJsonPath(flags, '$[?(@.on == true)]')).toEqual([{ on: true }])
      expect(queryJsonPath(flags, '$[?(@.on == null)]')).toEqual([{ on: null }])
    })
  })

  describe('errors', () => {
    it('reports an unfinished bracket', () => {
      expect(() => queryJsonPath(shop, '$.store[')).toThrow(
        'Invalid JSONPath `$.store[`: unexpected end of expression at position 8'
      )
    })

    it('reports trailing input', () => {
      expect(() => queryJsonPath(shop, '$.a b')).toThrow('Invalid JSONPath `$.a b`: unexpected `b` at position 4')
    })

    it('reports unterminated strings', () => {
      expect(() => queryJsonPath(shop, "$['store")).toThrow(QueryError)
    })

    it('reports incomplete filters', () => {
      try {
        queryJsonPath(shop, '$[?(@.a ==)]')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(QueryError)
        if (error instanceof QueryError) {
          expect(error.language).toBe('jsonpath')
          expect(error.expression).toBe('$[?(@.a ==)]')
        }
      }
    })
  })
})

describe('parseJsonPath', () => {
  it('builds segments', () => {
    expect(parseJsonPath('$.a[0]..b')).toEqual({
      root: '$',
      segments: [
        { descendant: false, selectors: [{ kind: 'name', name: 'a' }] },
        { descendant: false, selectors: [{ kind: 'index', index: 0 }] },
        { descendant: true, selectors: [{ kind: 'name', name: 'b' }] },
      ],
    })
  })
})
