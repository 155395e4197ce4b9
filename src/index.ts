// エラー
export {
  RopeError,
  RopeRangeError,
  RopeResourceError,
  RopeDisposedError,
  ScriptSyntaxError,
  ScriptOperationError,
} from './errors.js'

// スプレー木
export type { SplayNode, SplayTree } from './splay-tree.js'
export {
  createNode,
  createTree,
  nodeSize,
  rotateLeft,
  rotateRight,
  splay,
  locate,
  subtreeMaximum,
  appendAsNewRoot,
  insert,
  split,
  merge,
  moveRange,
  materialize,
  destroy,
  checkInvariants,
} from './splay-tree.js'

// Rope
export type { RopeOptions } from './rope.js'
export { Rope, DEFAULT_MAX_LENGTH } from './rope.js'

// テキストプロトコル
export type {
  MoveOp,
  Script,
  ErrorPolicy,
  DriverOptions,
  SkippedOp,
  ScriptResult,
} from './protocol.js'
export { parseScript, runScript } from './protocol.js'
