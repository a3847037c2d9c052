import {
  CartesianIndex,
  collection,
  toChildCollection,
  tuple
} from './children'
import { createKeyPolicy, defaultKeyPolicy, KeyPolicy } from './keys'
import { StringSink } from './sink'

describe('KeyPolicy', () => {
  describe('shouldPrintKeys', () => {
    it('should label collections that support keys', () => {
      const record = toChildCollection({ a: 1 })
      const map = toChildCollection(new Map([[1, 2]]))

      expect(defaultKeyPolicy.shouldPrintKeys(record)).toBe(true)
      expect(defaultKeyPolicy.shouldPrintKeys(map)).toBe(true)
    })

    it('should leave sequences and tuples unlabeled', () => {
      const sequence = toChildCollection([1])

      expect(defaultKeyPolicy.shouldPrintKeys(sequence)).toBe(false)
      expect(defaultKeyPolicy.shouldPrintKeys(tuple(1))).toBe(false)
    })

    it('should leave collections without keys unlabeled', () => {
      const set = toChildCollection(new Set([1]))

      expect(defaultKeyPolicy.shouldPrintKeys(set)).toBe(false)
    })

    it('should apply overrides registered for a kind', () => {
      const decide = jest.fn(() => true)
      const policy = createKeyPolicy().override('sequence', decide)
      const children = toChildCollection([1])

      expect(policy.shouldPrintKeys(children)).toBe(true)
      expect(decide).toHaveBeenCalledWith(children)
    })

    it('should support host-defined kinds', () => {
      const policy = new KeyPolicy().override('rows', () => false)

      expect(policy.shouldPrintKeys(collection('rows', [['r', 1]]))).toBe(false)
      expect(policy.shouldPrintKeys(collection('cols', [['c', 1]]))).toBe(true)
    })

    it('should not change the original when a clone is overridden', () => {
      const clone = defaultKeyPolicy.clone().override('record', () => false)
      const children = toChildCollection({ a: 1 })

      expect(clone.shouldPrintKeys(children)).toBe(false)
      expect(defaultKeyPolicy.shouldPrintKeys(children)).toBe(true)
    })
  })

  describe('renderChildKey', () => {
    const render = (key: unknown): string => {
      const sink = new StringSink()
      defaultKeyPolicy.renderChildKey(sink, key)
      return sink.toString()
    }

    it('should write the compact representation of a key', () => {
      expect(render('name')).toBe("'name'")
      expect(render(3)).toBe('3')
      expect(render(Symbol('id'))).toBe('Symbol(id)')
    })

    it('should write structured indexes as coordinate tuples', () => {
      expect(render(new CartesianIndex(1, 2))).toBe('(1, 2)')
    })

    it('should honor the display context of the sink', () => {
      const sink = new StringSink({ colors: true })
      defaultKeyPolicy.renderChildKey(sink, 5)

      expect(sink.toString()).toBe('\u001b[33m5\u001b[39m')
    })
  })
})
