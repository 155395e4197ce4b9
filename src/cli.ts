/**
 * コマンドラインの処理
 *
 * 入出力はすべて引数で受け取るので、プロセスを起動せずにテストできる。
 * 実際の stdin / stdout への接続は main.ts が行う。
 */

import { RopeError } from './errors.js'
import { runScript } from './protocol.js'
import type { DriverOptions } from './protocol.js'

export const USAGE = 'usage: splay-rope [--skip-invalid] [--max-length=<n>] < input'

/** 出力先 */
export interface CliIO {
  stdout(text: string): void
  stderr(line: string): void
}

/** 終了コード */
export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Usage: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

/** 引数を DriverOptions に変換する。不正なら null */
export function parseArgs(args: readonly string[]): DriverOptions | null {
  const options: DriverOptions = {}
  for (const arg of args) {
    if (arg === '--skip-invalid') {
      options.onError = 'skip'
    } else if (arg.startsWith('--max-length=')) {
      const value = arg.slice('--max-length='.length)
      if (!/^\d+$/.test(value)) return null
      options.maxLength = Number(value)
    } else {
      return null
    }
  }
  return options
}

/** 入力全体を実行し、終了コードを返す */
export function runCli(args: readonly string[], input: string, io: CliIO): ExitCode {
  const options = parseArgs(args)
  if (options === null) {
    io.stderr(USAGE)
    return ExitCode.Usage
  }

  try {
    const { text, skipped } = runScript(input, options)
    for (const { op, error } of skipped) {
      io.stderr(`${op.line} 行目の操作をスキップしました (${op.i} ${op.j} ${op.k}): ${error.message}`)
    }
    io.stdout(text)
    return ExitCode.Ok
  } catch (e) {
    if (e instanceof RopeError || e instanceof RangeError) {
      io.stderr(`エラー: ${e.message}`)
      return ExitCode.Failure
    }
    throw e
  }
}
