import { inspect } from 'util'
import { isPlainObject, isTreeNode, nodeValue } from './children'
import { DisplayContext, StringSink, TextSink } from './sink'

/**
 * Writes the display text of a single node.
 */
export type NodeRenderer = (sink: TextSink, node: unknown) => void

// Compact, size-limited defaults; a sink's own context takes precedence.
export const COMPACT_DISPLAY: DisplayContext = {
  compact: true,
  breakLength: Infinity,
  depth: 1,
  maxArrayLength: 10,
  maxStringLength: 80
}

export function formatValue(value: unknown, context?: DisplayContext): string {
  return inspect(value, { ...COMPACT_DISPLAY, ...context })
}

// Containers are shown as a summary since their contents follow as children.
// A tree node without its own value is inspected whole.
function summarize(value: unknown): string | undefined {
  if (isTreeNode(value)) return undefined
  if (Array.isArray(value)) return `Array(${value.length})`
  if (value instanceof Map) return `Map(${value.size})`
  if (value instanceof Set) return `Set(${value.size})`
  if (isPlainObject(value)) return `Object(${Object.keys(value).length})`
  return undefined
}

/**
 * Default node renderer. Writes a compact representation of the node's value.
 *
 * Customize the display of a class either by implementing `nodeValue()` or
 * `[util.inspect.custom]`, or by passing another renderer to `printTree`.
 */
export function renderNode(sink: TextSink, node: unknown): void {
  const value = nodeValue(node)
  sink.write(summarize(value) ?? formatValue(value, sink.context))
}

/**
 * Renders a single node to a string.
 *
 * @param node - The node to render.
 * @param context - Display context inherited by the renderer.
 * @param renderer - Renderer to use instead of `renderNode`.
 * @returns The rendered text.
 */
export function renderNodeToString(
  node: unknown,
  context?: DisplayContext,
  renderer: NodeRenderer = renderNode
): string {
  const sink = new StringSink(context)
  renderer(sink, node)
  return sink.toString()
}
