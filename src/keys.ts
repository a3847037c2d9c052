import { CartesianIndex, ChildCollection, CollectionKind } from './children'
import { formatValue } from './render'
import { TextSink } from './sink'

export type KeyDecider = (children: ChildCollection) => boolean

const never: KeyDecider = () => false

/**
 * Decides whether children are labeled with their keys, and how keys look.
 *
 * Without an override, every collection that supports key lookup is labeled.
 * Overrides are registered per collection kind.
 */
export class KeyPolicy {
  private readonly overrides: Map<CollectionKind, KeyDecider>

  constructor(overrides: Iterable<readonly [CollectionKind, KeyDecider]> = []) {
    this.overrides = new Map(overrides)
  }

  override(kind: CollectionKind, decide: KeyDecider): this {
    this.overrides.set(kind, decide)
    return this
  }

  clone(): KeyPolicy {
    return new KeyPolicy(this.overrides)
  }

  shouldPrintKeys(children: ChildCollection): boolean {
    const decide = this.overrides.get(children.kind)
    return decide ? decide(children) : children.hasKeys
  }

  renderChildKey(sink: TextSink, key: unknown): void {
    if (key instanceof CartesianIndex) {
      sink.write(key.toString())
    } else {
      sink.write(formatValue(key, sink.context))
    }
  }
}

/**
 * Policy that leaves positional collections unlabeled: sequences, tuples and
 * plain iterables.
 */
export function createKeyPolicy(): KeyPolicy {
  return new KeyPolicy([
    ['sequence', never],
    ['tuple', never],
    ['iterable', never]
  ])
}

// Shared by every call that does not pass its own policy.
export const defaultKeyPolicy = createKeyPolicy()
