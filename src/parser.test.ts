import { parseTree } from './parser'

describe('parseTree', () => {
  test('should parse a JSON document', () => {
    expect(parseTree('{"a": [1, 2], "b": null}')).toEqual({
      a: [1, 2],
      b: null
    })
  })

  test('should parse scalar documents', () => {
    expect(parseTree('"leaf"')).toBe('leaf')
    expect(parseTree('42')).toBe(42)
  })

  test('should throw on invalid JSON', () => {
    expect(() => parseTree('{"a": ')).toThrow('Invalid JSON data')
  })

  test('should throw on empty input', () => {
    expect(() => parseTree('')).toThrow('Invalid JSON data')
  })
})
