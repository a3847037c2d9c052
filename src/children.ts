/**
 * The host-structure boundary: how the printer learns the children of a node
 * and whether those children can be labeled by key.
 */

export type CollectionKind =
  | 'sequence'
  | 'tuple'
  | 'grid'
  | 'set'
  | 'map'
  | 'record'
  | 'iterable'
  | 'empty'
  | (string & {})

export type ChildEntry = readonly [key: unknown, child: unknown]

/**
 * Ordered children of a node, paired with their keys.
 *
 * `entries` is re-invoked on every traversal, so collections built from a
 * one-shot iterator can only be walked once.
 */
export class ChildCollection {
  constructor(
    readonly kind: CollectionKind,
    private readonly source: () => Iterable<ChildEntry>,
    readonly hasKeys: boolean
  ) {}

  entries(): Iterable<ChildEntry> {
    return this.source()
  }
}

export type ChildSource =
  | ChildCollection
  | Iterable<unknown>
  | Readonly<Record<string, unknown>>
  | null
  | undefined

/**
 * A value that knows its own children. `nodeValue` supplies what is displayed
 * for the node, defaulting to the node itself.
 */
export interface TreeNode {
  children(): ChildSource
  nodeValue?(): unknown
}

export type ChildrenGetter = (node: unknown) => ChildSource

/**
 * Key of a child stored at integer coordinates, such as a cell of a grid.
 */
export class CartesianIndex {
  readonly coordinates: readonly number[]

  constructor(...coordinates: number[]) {
    for (const c of coordinates) {
      if (!Number.isInteger(c)) {
        throw new TypeError(`Coordinate is not an integer: ${c}`)
      }
    }
    this.coordinates = Object.freeze([...coordinates])
  }

  toString(): string {
    return this.coordinates.length === 1
      ? `(${this.coordinates[0]},)`
      : `(${this.coordinates.join(', ')})`
  }
}

export const EMPTY_CHILDREN = new ChildCollection('empty', () => [], false)

export function collection(
  kind: CollectionKind,
  entries: Iterable<ChildEntry> | (() => Iterable<ChildEntry>),
  hasKeys = true
): ChildCollection {
  return new ChildCollection(
    kind,
    typeof entries === 'function' ? entries : () => entries,
    hasKeys
  )
}

// Holes in sparse arrays are listed as undefined children.
export function sequence(items: readonly unknown[]): ChildCollection {
  return collection('sequence', () => items.entries(), true)
}

export function tuple(...items: unknown[]): ChildCollection {
  const frozen = Object.freeze(items)
  return collection('tuple', () => frozen.entries(), true)
}

/**
 * Children laid out in rows, keyed by their `(row, column)` position.
 */
export function grid(rows: readonly (readonly unknown[])[]): ChildCollection {
  return collection('grid', function* (): Generator<ChildEntry> {
    for (const [r, row] of rows.entries()) {
      for (const [c, child] of row.entries()) {
        yield [new CartesianIndex(r, c), child]
      }
    }
  })
}

export function keyed(
  source: ReadonlyMap<unknown, unknown> | Readonly<Record<string, unknown>>
): ChildCollection {
  if (source instanceof Map) {
    return collection('map', () => source.entries())
  }
  return collection('record', () => Object.entries(source))
}

function unkeyed(
  kind: CollectionKind,
  items: Iterable<unknown>
): ChildCollection {
  return collection(
    kind,
    function* (): Generator<ChildEntry> {
      let i = 0
      for (const child of items) yield [i++, child]
    },
    false
  )
}

export function isPlainObject(
  value: unknown
): value is Readonly<Record<string, unknown>> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isIterable(value: object): value is Iterable<unknown> {
  return (
    Symbol.iterator in value && typeof value[Symbol.iterator] === 'function'
  )
}

export function isTreeNode(value: unknown): value is TreeNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'children' in value &&
    typeof value.children === 'function'
  )
}

function typeName(value: object): string {
  const name: unknown = value.constructor?.name
  return typeof name === 'string' && name !== '' ? name : typeof value
}

/**
 * Normalizes whatever a children getter returned.
 *
 * @param source - Arrays, maps, sets, iterables, plain objects or an existing
 *   collection. `null`, `undefined` and primitives mean no children.
 * @returns The children as a collection.
 * @throws TypeError for any other object.
 */
export function toChildCollection(source: unknown): ChildCollection {
  if (source instanceof ChildCollection) return source
  if (typeof source !== 'object' || source === null) return EMPTY_CHILDREN

  if (Array.isArray(source)) return sequence(source)
  if (source instanceof Map) return keyed(source)
  if (source instanceof Set) return unkeyed('set', source)
  if (isIterable(source)) return unkeyed('iterable', source)
  if (isPlainObject(source)) return keyed(source)

  throw new TypeError(`Unsupported child collection: ${typeName(source)}`)
}

/**
 * Children of an arbitrary value: a `TreeNode` lists its own, containers
 * list their contents and everything else is a leaf.
 */
export function defaultChildren(node: unknown): ChildCollection {
  if (isTreeNode(node)) return toChildCollection(node.children())
  if (
    Array.isArray(node) ||
    node instanceof Map ||
    node instanceof Set ||
    isPlainObject(node)
  ) {
    return toChildCollection(node)
  }
  return EMPTY_CHILDREN
}

export function nodeValue(node: unknown): unknown {
  if (isTreeNode(node) && node.nodeValue !== undefined) {
    return node.nodeValue()
  }
  return node
}
