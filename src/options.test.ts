import { ASCII_CHARSET, makeCharset, UNICODE_CHARSET } from './charset'
import { defaultChildren } from './children'
import { createKeyPolicy, defaultKeyPolicy } from './keys'
import { DEFAULT_MAX_DEPTH, resolvePrintOptions } from './options'

describe('resolvePrintOptions', () => {
  it('should fill in defaults', () => {
    const options = resolvePrintOptions()

    expect(options).toEqual({
      maxDepth: DEFAULT_MAX_DEPTH,
      indicateTruncation: true,
      charset: UNICODE_CHARSET,
      printKeys: undefined,
      keyPolicy: defaultKeyPolicy,
      children: defaultChildren
    })
    expect(options.maxDepth).toBe(5)
    expect(Object.isFrozen(options)).toBe(true)
  })

  it('should keep supplied values', () => {
    const keyPolicy = createKeyPolicy()
    const children = (): undefined => undefined

    const options = resolvePrintOptions({
      maxDepth: 0,
      indicateTruncation: false,
      charset: ASCII_CHARSET,
      printKeys: true,
      keyPolicy,
      children
    })

    expect(options.maxDepth).toBe(0)
    expect(options.indicateTruncation).toBe(false)
    expect(options.charset).toEqual(ASCII_CHARSET)
    expect(options.printKeys).toBe(true)
    expect(options.keyPolicy).toBe(keyPolicy)
    expect(options.children).toBe(children)
  })

  it('should reject negative depths', () => {
    expect(() => resolvePrintOptions({ maxDepth: -1 })).toThrow(
      'Invalid print options: maxDepth'
    )
  })

  it('should reject fractional depths', () => {
    expect(() => resolvePrintOptions({ maxDepth: 1.5 })).toThrow(
      'Invalid print options: maxDepth'
    )
  })

  it('should reject empty glyphs', () => {
    const charset = makeCharset(UNICODE_CHARSET, { trunc: '' })

    expect(() => resolvePrintOptions({ charset })).toThrow(
      'Invalid print options: charset.trunc'
    )
  })

  it('should reject values of the wrong type', () => {
    expect(() => resolvePrintOptions({ printKeys: 'yes' })).toThrow(
      'Invalid print options: printKeys'
    )
  })
})
