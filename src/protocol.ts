/**
 * テキストプロトコルの読み込みと実行
 *
 * 入力形式:
 *   1行目: 初期テキスト（空行なら空文字列）
 *   次のトークン: 操作数 numOps
 *   続く numOps 組: 空白区切りの非負整数 i j k
 */

import { ScriptOperationError, ScriptSyntaxError } from './errors.js'
import { Rope } from './rope.js'

/** 1つの moveRange 操作 */
export interface MoveOp {
  i: number
  j: number
  k: number
  /** i が書かれていた行（1始まり） */
  line: number
}

/** 読み込んだスクリプト */
export interface Script {
  text: string
  ops: MoveOp[]
}

/** 範囲エラーの扱い: 'abort' は中断、'skip' は記録して次へ */
export type ErrorPolicy = 'abort' | 'skip'

export interface DriverOptions {
  onError?: ErrorPolicy
  maxLength?: number
}

/** スキップされた操作 */
export interface SkippedOp {
  op: MoveOp
  error: RangeError
}

export interface ScriptResult {
  text: string
  skipped: SkippedOp[]
}

interface Token {
  value: string
  line: number
}

/** 2行目以降を空白で区切り、行番号付きのトークンにする */
function tokenize(lines: string[], firstLine: number): Token[] {
  const tokens: Token[] = []
  lines.forEach((content, idx) => {
    for (const value of content.split(/\s+/)) {
      if (value !== '') tokens.push({ value, line: firstLine + idx })
    }
  })
  return tokens
}

function parseCount(token: Token | undefined, what: string, lastLine: number): number {
  if (token === undefined) {
    throw new ScriptSyntaxError(lastLine, `${what} がありません`)
  }
  if (!/^\d+$/.test(token.value)) {
    throw new ScriptSyntaxError(token.line, `${what} は非負整数でなければなりません: '${token.value}'`)
  }
  const n = Number(token.value)
  if (!Number.isSafeInteger(n)) {
    throw new ScriptSyntaxError(token.line, `${what} が大きすぎます: ${token.value}`)
  }
  return n
}

/** 入力全体をパースする */
export function parseScript(input: string): Script {
  const lines = input.split(/\r?\n/)
  const text = (lines[0] ?? '').trim()
  const tokens = tokenize(lines.slice(1), 2)
  const lastLine = lines.length

  let pos = 0
  const numOps = parseCount(tokens[pos++], '操作数', lastLine)
  const ops: MoveOp[] = []
  for (let n = 0; n < numOps; n++) {
    const first = tokens[pos]
    const i = parseCount(tokens[pos++], `${n + 1} 番目の操作の i`, lastLine)
    const j = parseCount(tokens[pos++], `${n + 1} 番目の操作の j`, lastLine)
    const k = parseCount(tokens[pos++], `${n + 1} 番目の操作の k`, lastLine)
    ops.push({ i, j, k, line: first?.line ?? lastLine })
  }

  return { text, ops }
}

/**
 * スクリプトを実行し、最終テキストを返す。
 * onError = 'skip' のとき、範囲外の操作は skipped に記録して残りを続ける。
 */
export function runScript(input: string, options: DriverOptions = {}): ScriptResult {
  const { text, ops } = parseScript(input)
  const onError = options.onError ?? 'abort'
  const rope = Rope.from(text, { maxLength: options.maxLength })
  const skipped: SkippedOp[] = []

  try {
    for (const op of ops) {
      try {
        rope.moveRange(op.i, op.j, op.k)
      } catch (e) {
        if (!(e instanceof RangeError)) throw e
        if (onError === 'abort') throw new ScriptOperationError(op.line, e)
        skipped.push({ op, error: e })
      }
    }
    return { text: rope.toString(), skipped }
  } finally {
    rope.dispose()
  }
}
