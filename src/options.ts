import { CharacterSet, makeCharset, UNICODE_CHARSET } from './charset'
import { ChildrenGetter, defaultChildren } from './children'
import { defaultKeyPolicy, KeyPolicy } from './keys'
import { formatIssues, printOptionsSchema } from './schemas'

export const DEFAULT_MAX_DEPTH = 5

export interface PrintOptions {
  /** Subtrees below this depth are not expanded. */
  maxDepth?: number
  /** Print the `trunc` glyph beneath truncated nodes. */
  indicateTruncation?: boolean
  charset?: CharacterSet
  /**
   * Label children with their keys. Leave unset to let `keyPolicy` decide
   * node by node.
   */
  printKeys?: boolean
  keyPolicy?: KeyPolicy
  /** Lists the children of a node. */
  children?: ChildrenGetter
}

export interface ResolvedPrintOptions {
  readonly maxDepth: number
  readonly indicateTruncation: boolean
  readonly charset: CharacterSet
  readonly printKeys: boolean | undefined
  readonly keyPolicy: KeyPolicy
  readonly children: ChildrenGetter
}

/**
 * Validates print options and fills in defaults.
 *
 * @param options - A `PrintOptions` record, checked at run time.
 * @returns The complete, frozen options record.
 */
export function resolvePrintOptions(
  options: unknown = {}
): ResolvedPrintOptions {
  const result = printOptionsSchema.safeParse(options)

  if (!result.success) {
    throw new Error(`Invalid print options: ${formatIssues(result.error)}`)
  }

  const data = result.data

  return Object.freeze({
    maxDepth: data.maxDepth ?? DEFAULT_MAX_DEPTH,
    indicateTruncation: data.indicateTruncation ?? true,
    charset: data.charset ? makeCharset(data.charset) : UNICODE_CHARSET,
    printKeys: data.printKeys,
    keyPolicy: data.keyPolicy ?? defaultKeyPolicy,
    children: data.children ?? defaultChildren
  })
}
