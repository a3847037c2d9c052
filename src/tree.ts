import stringWidth from 'string-width'
import { toChildCollection } from './children'
import {
  PrintOptions,
  ResolvedPrintOptions,
  resolvePrintOptions
} from './options'
import { PeekableIterator } from './peekable'
import { NodeRenderer, renderNode, renderNodeToString } from './render'
import { DisplayContext, StringSink, TextSink } from './sink'

/**
 * Per-call position in the traversal.
 */
interface RenderState {
  readonly depth: number
  // Written before every continuation line and every child branch.
  readonly prefix: string
}

function pad(width: number): string {
  return ' '.repeat(width)
}

function printSubtree(
  renderer: NodeRenderer,
  sink: TextSink,
  node: unknown,
  options: ResolvedPrintOptions,
  state: RenderState
): void {
  const { charset } = options

  // Render the current node, keeping continuation lines under its branch.
  const text = renderNodeToString(node, sink.context, renderer)
  for (const [i, line] of text.split('\n').entries()) {
    if (i !== 0) sink.write(state.prefix)
    sink.write(`${line}\n`)
  }

  const children = toChildCollection(options.children(node))
  const entries = new PeekableIterator(children.entries())

  // Leaf.
  if (entries.done) return

  if (state.depth >= options.maxDepth) {
    if (options.indicateTruncation) {
      sink.write(`${state.prefix}${charset.trunc}\n`)
      sink.write(`${state.prefix}\n`)
    }
    return
  }

  const printKeys =
    children.hasKeys &&
    (options.printKeys ?? options.keyPolicy.shouldPrintKeys(children))

  while (!entries.done) {
    const result = entries.next()
    if (result.done) break
    const [key, child] = result.value

    let childPrefix = state.prefix

    sink.write(state.prefix)

    if (entries.done) {
      // Nothing continues below the last child.
      sink.write(charset.terminator)
      childPrefix += pad(
        stringWidth(charset.skip) + stringWidth(charset.dash) + 1
      )
    } else {
      sink.write(charset.mid)
      childPrefix += charset.skip + pad(stringWidth(charset.dash) + 1)
    }

    sink.write(`${charset.dash} `)

    if (printKeys) {
      const keySink = new StringSink(sink.context)
      options.keyPolicy.renderChildKey(keySink, key)
      const keyText = keySink.toString()

      sink.write(`${keyText}${charset.pair}`)
      childPrefix += pad(stringWidth(keyText) + stringWidth(charset.pair))
    }

    printSubtree(renderer, sink, child, options, {
      depth: state.depth + 1,
      prefix: childPrefix
    })
  }
}

/**
 * Prints a text diagram of a tree.
 *
 * Each node is written on its own line, children are drawn beneath their
 * parent with branch glyphs from `options.charset`, and subtrees deeper than
 * `options.maxDepth` are elided. Cyclic trees are only bounded by `maxDepth`.
 *
 * @example
 * ```ts
 * printTree(process.stdout, [1, 2, [3, 4]])
 * // Array(3)
 * // ├─ 1
 * // ├─ 2
 * // └─ Array(2)
 * //    ├─ 3
 * //    └─ 4
 * ```
 */
export function printTree(
  sink: TextSink,
  tree: unknown,
  options?: PrintOptions
): void
export function printTree(
  renderer: NodeRenderer,
  sink: TextSink,
  tree: unknown,
  options?: PrintOptions
): void
export function printTree(
  first: NodeRenderer | TextSink,
  second: unknown,
  third?: unknown,
  fourth?: PrintOptions
): void {
  if (typeof first === 'function') {
    printWith(first, toSink(second), third, fourth)
  } else {
    printWith(renderNode, first, second, third)
  }
}

function isTextSink(value: unknown): value is TextSink {
  return (
    typeof value === 'object' &&
    value !== null &&
    'write' in value &&
    typeof value.write === 'function'
  )
}

function toSink(value: unknown): TextSink {
  if (!isTextSink(value)) throw new TypeError('Expected a text sink')
  return value
}

function printWith(
  renderer: NodeRenderer,
  sink: TextSink,
  tree: unknown,
  options: unknown
): void {
  printSubtree(renderer, sink, tree, resolvePrintOptions(options), {
    depth: 0,
    prefix: ''
  })
}

/**
 * Prints a tree to the given sink, standard output unless specified.
 */
export function displayTree(
  tree: unknown,
  options?: PrintOptions,
  sink: TextSink = process.stdout
): void {
  printWith(renderNode, sink, tree, options)
}

/**
 * Renders a tree diagram to a string.
 *
 * @param tree - The tree to render.
 * @param options - Print options.
 * @param context - Display context inherited by node and key renderers.
 * @returns The diagram, one line per row, each terminated by a newline.
 */
export function treeToString(
  tree: unknown,
  options?: PrintOptions,
  context?: DisplayContext
): string {
  const sink = new StringSink(context)
  printWith(renderNode, sink, tree, options)
  return sink.toString()
}
