export {
  ASCII_CHARSET,
  branchWidth,
  CharacterSet,
  CharsetName,
  isCharsetName,
  makeCharset,
  presetCharset,
  UNICODE_CHARSET
} from './charset'
export {
  CartesianIndex,
  ChildCollection,
  ChildEntry,
  ChildrenGetter,
  ChildSource,
  collection,
  CollectionKind,
  defaultChildren,
  grid,
  isTreeNode,
  keyed,
  nodeValue,
  sequence,
  toChildCollection,
  TreeNode,
  tuple
} from './children'
export {
  createKeyPolicy,
  defaultKeyPolicy,
  KeyDecider,
  KeyPolicy
} from './keys'
export {
  DEFAULT_MAX_DEPTH,
  PrintOptions,
  ResolvedPrintOptions,
  resolvePrintOptions
} from './options'
export { PeekableIterator } from './peekable'
export { NodeRenderer, renderNode, renderNodeToString } from './render'
export { DisplayContext, StringSink, TextSink } from './sink'
export { displayTree, printTree, treeToString } from './tree'
