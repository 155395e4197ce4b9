/**
 * スプレー木ベースのRope
 *
 * 文書を1文字1ノードのスプレー木で保持し、部分列の切り取り＆貼り付けを
 * split / merge だけで行う（移動しない部分は走査もコピーもしない）。
 * 文字は Unicode コードポイント単位で数える。
 */

import { RopeDisposedError, RopeRangeError, RopeResourceError } from './errors.js'
import {
  appendAsNewRoot,
  createTree,
  destroy,
  insert,
  locate,
  materialize,
  moveRange,
} from './splay-tree.js'
import type { SplayTree } from './splay-tree.js'

/** 符号なし32ビットで数えられる最大ノード数 */
export const DEFAULT_MAX_LENGTH = 0xffffffff

/** Rope の設定 */
export interface RopeOptions {
  /** 保持できる最大文字数（既定: DEFAULT_MAX_LENGTH） */
  maxLength?: number
}

function resolveMaxLength(options: RopeOptions | undefined): number {
  const maxLength = options?.maxLength ?? DEFAULT_MAX_LENGTH
  if (!Number.isInteger(maxLength) || maxLength < 0) {
    throw new RopeRangeError('maxLength', maxLength, 0, Number.MAX_SAFE_INTEGER)
  }
  return maxLength
}

/**
 * スプレー木ベースのRope
 *
 * - from(text): O(n)
 * - moveRange(i, j, k): 償却 O(log n)
 * - charAt(k) / insert(rank, ch): 償却 O(log n)
 * - toString() / render(): O(n)
 */
export class Rope {
  /** @internal */
  _tree: SplayTree = createTree()
  private _disposed = false
  readonly maxLength: number

  constructor(options?: RopeOptions) {
    this.maxLength = resolveMaxLength(options)
  }

  /** 文字列から一括構築する */
  static from(text: string, options?: RopeOptions): Rope {
    const rope = new Rope(options)
    const chars = Array.from(text)
    if (chars.length > rope.maxLength) {
      throw new RopeResourceError(chars.length, rope.maxLength)
    }
    for (const ch of chars) appendAsNewRoot(rope._tree, ch)
    return rope
  }

  /** 全体の文字数 */
  get length(): number {
    return this._tree.size
  }

  /** dispose 済みかどうか */
  get disposed(): boolean {
    return this._disposed
  }

  /**
   * 位置 [i, j] の部分列を切り取り、残りの k 文字目の直後へ貼り付ける。
   * i, j は0始まり、k は1始まり（k = 0 なら先頭）。
   */
  moveRange(i: number, j: number, k: number): void {
    moveRange(this.live(), i, j, k)
  }

  /** 位置 k（0始まり）の文字 */
  charAt(k: number): string {
    return locate(this.live(), k).value
  }

  /** 位置 rank に1文字挿入する */
  insert(rank: number, ch: string): void {
    const tree = this.live()
    const chars = Array.from(ch)
    if (chars.length !== 1) {
      throw new RopeRangeError('文字数', chars.length, 1, 1)
    }
    if (tree.size + 1 > this.maxLength) {
      throw new RopeResourceError(tree.size + 1, this.maxLength)
    }
    insert(tree, rank, ch)
  }

  /** 全文字を順に配列で取得 */
  render(): string[] {
    return materialize(this.live())
  }

  /** 文字列に変換 */
  toString(): string {
    return this.render().join('')
  }

  /** 全ノードを解放する。2回目以降は何もしない */
  dispose(): void {
    if (this._disposed) return
    destroy(this._tree)
    this._disposed = true
  }

  private live(): SplayTree {
    if (this._disposed) throw new RopeDisposedError()
    return this._tree
  }
}
