/**
 * Rope のエラー型
 *
 * 不正な入力は構造を変更する前に検出し、型付きの例外として呼び出し側へ返す。
 */

/** 全エラーの基底クラス */
export class RopeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RopeError'
  }
}

/**
 * 範囲外のインデックス。
 * 組み込みの RangeError を継承するので instanceof RangeError でも判定できる。
 */
export class RopeRangeError extends RangeError {
  /** 指定されたインデックス */
  readonly index: number
  /** 許容される下限（含む） */
  readonly min: number
  /** 許容される上限（含む）。空の範囲では min - 1 になる */
  readonly max: number

  constructor(what: string, index: number, min: number, max: number) {
    super(
      max < min
        ? `${what} = ${index} は範囲外です（有効な値がありません）`
        : `${what} = ${index} は範囲外です（${min} 以上 ${max} 以下）`,
    )
    this.name = 'RopeRangeError'
    this.index = index
    this.min = min
    this.max = max
  }
}

/** ノード数の上限を超える確保 */
export class RopeResourceError extends RopeError {
  readonly requested: number
  readonly capacity: number

  constructor(requested: number, capacity: number) {
    super(`ノードを確保できません: ${requested} 個が必要ですが上限は ${capacity} 個です`)
    this.name = 'RopeResourceError'
    this.requested = requested
    this.capacity = capacity
  }
}

/** dispose 済みの Rope への操作 */
export class RopeDisposedError extends RopeError {
  constructor() {
    super('破棄済みの Rope は使用できません')
    this.name = 'RopeDisposedError'
  }
}

/** 入力スクリプトの書式エラー */
export class ScriptSyntaxError extends RopeError {
  /** 1始まりの行番号 */
  readonly line: number

  constructor(line: number, message: string) {
    super(`${line} 行目: ${message}`)
    this.name = 'ScriptSyntaxError'
    this.line = line
  }
}

/** スクリプトの操作が範囲外だった（中断時） */
export class ScriptOperationError extends RopeError {
  /** 1始まりの行番号 */
  readonly line: number
  readonly rangeError: RangeError

  constructor(line: number, rangeError: RangeError) {
    super(`${line} 行目の操作: ${rangeError.message}`)
    this.name = 'ScriptOperationError'
    this.line = line
    this.rangeError = rangeError
  }
}

/** index が整数かつ [min, max] に収まることを確認する */
export function checkIndex(what: string, index: number, min: number, max: number): void {
  if (!Number.isInteger(index) || index < min || index > max) {
    throw new RopeRangeError(what, index, min, max)
  }
}
