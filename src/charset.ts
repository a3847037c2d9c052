import stringWidth from 'string-width'

/**
 * Set of strings used to draw tree branches.
 *
 * - `mid`: forked branch segment connecting to middle children.
 * - `terminator`: final branch segment connecting to the last child.
 * - `skip`: vertical branch segment.
 * - `dash`: horizontal segment printed to the right of `mid` and `terminator`.
 * - `trunc`: marks a subtree truncated at the maximum depth.
 * - `pair`: printed between a child's key and the child itself.
 */
export interface CharacterSet {
  readonly mid: string
  readonly terminator: string
  readonly skip: string
  readonly dash: string
  readonly trunc: string
  readonly pair: string
}

export type CharsetName = 'unicode' | 'ascii'

type Glyph = string | number

export function makeCharset(
  mid: Glyph,
  terminator: Glyph,
  skip: Glyph,
  dash: Glyph,
  trunc: Glyph,
  pair: Glyph
): CharacterSet
export function makeCharset(
  base: CharacterSet,
  overrides?: Partial<CharacterSet>
): CharacterSet
export function makeCharset(
  first: CharacterSet | Glyph,
  ...rest: Array<Glyph | Partial<CharacterSet> | undefined>
): CharacterSet {
  if (typeof first === 'object') {
    const extra = rest[0]
    const overrides: Partial<CharacterSet> =
      typeof extra === 'object' ? extra : {}
    return makeCharset(
      overrides.mid ?? first.mid,
      overrides.terminator ?? first.terminator,
      overrides.skip ?? first.skip,
      overrides.dash ?? first.dash,
      overrides.trunc ?? first.trunc,
      overrides.pair ?? first.pair
    )
  }

  const [terminator, skip, dash, trunc, pair] = rest.map(g => String(g))
  return Object.freeze({
    mid: String(first),
    terminator,
    skip,
    dash,
    trunc,
    pair
  })
}

export const UNICODE_CHARSET = makeCharset('├', '└', '│', '─', '⋮', ' ⇒ ')

export const ASCII_CHARSET = makeCharset('+', '\\', '|', '--', '...', ' => ')

export function isCharsetName(value: string): value is CharsetName {
  return value === 'unicode' || value === 'ascii'
}

/**
 * Returns one of the built-in character sets.
 *
 * @param name - `unicode` (default) or `ascii`.
 * @returns The preset character set.
 */
export function presetCharset(name: string = 'unicode'): CharacterSet {
  if (!isCharsetName(name)) {
    throw new Error(`Unrecognized character set preset: ${name}`)
  }
  return name === 'unicode' ? UNICODE_CHARSET : ASCII_CHARSET
}

// Display columns taken by a branch glyph and its dash.
export function branchWidth(charset: CharacterSet): number {
  return stringWidth(charset.mid) + stringWidth(charset.dash)
}
