import { describe, it, expect } from 'vitest'
import { Rope, DEFAULT_MAX_LENGTH } from '../src/rope.js'
import { checkInvariants } from '../src/splay-tree.js'
import { RopeDisposedError, RopeRangeError, RopeResourceError } from '../src/errors.js'

describe('Rope', () => {
  describe('基本操作', () => {
    it('空のRopeはlength 0、空文字列を返す', () => {
      const rope = Rope.from('')
      expect(rope.length).toBe(0)
      expect(rope.toString()).toBe('')
      expect(rope.render()).toEqual([])
      rope.dispose()
      expect(rope.disposed).toBe(true)
    })

    it('文字列から一括構築', () => {
      const rope = Rope.from('hello')
      expect(rope.length).toBe(5)
      expect(rope.toString()).toBe('hello')
      expect(rope.render()).toEqual(['h', 'e', 'l', 'l', 'o'])
      checkInvariants(rope._tree)
    })

    it('charAt で位置の文字を取得', () => {
      const rope = Rope.from('abcdef')
      expect(rope.charAt(0)).toBe('a')
      expect(rope.charAt(5)).toBe('f')
      expect(rope.charAt(3)).toBe('d')
      expect(rope.toString()).toBe('abcdef')
      expect(() => rope.charAt(6)).toThrow(RopeRangeError)
    })

    it('コードポイント単位で数える', () => {
      const rope = Rope.from('a😀b')
      expect(rope.length).toBe(3)
      expect(rope.charAt(1)).toBe('😀')
      rope.moveRange(1, 1, 2)
      expect(rope.toString()).toBe('ab😀')
    })
  })

  describe('moveRange', () => {
    it('部分列を残りの k 文字目の後ろへ移す', () => {
      const rope = Rope.from('abcdef')
      rope.moveRange(0, 2, 2)
      expect(rope.toString()).toBe('deabcf')
      expect(rope.length).toBe(6)
    })

    it('k = 0 なら先頭へ', () => {
      const rope = Rope.from('hello')
      rope.moveRange(1, 2, 0)
      expect(rope.toString()).toBe('elhlo')
    })

    it('1文字のRopeはそのまま', () => {
      const rope = Rope.from('a')
      rope.moveRange(0, 0, 0)
      expect(rope.toString()).toBe('a')
    })

    it('連続した移動', () => {
      const rope = Rope.from('abcdefgh')
      rope.moveRange(5, 7, 0) // fghabcde
      rope.moveRange(0, 0, 7) // ghabcdef
      rope.moveRange(2, 3, 4) // ghcdabef
      expect(rope.toString()).toBe('ghcdabef')
      checkInvariants(rope._tree)
    })

    it('範囲外なら RopeRangeError で内容は変わらない', () => {
      const rope = Rope.from('abcdef')
      expect(() => rope.moveRange(0, 2, 4)).toThrow(RopeRangeError)
      expect(() => rope.moveRange(2, 1, 0)).toThrow(RangeError)
      expect(rope.toString()).toBe('abcdef')
    })

    it('ランダムな移動が配列モデルと一致する', () => {
      // 再現可能な疑似乱数
      let state = 99
      const rng = () => {
        state ^= state << 13
        state ^= state >> 17
        state ^= state << 5
        return (state >>> 0) / 0x100000000
      }

      const arr: string[] = []
      for (let i = 0; i < 2000; i++) arr.push(String.fromCharCode(97 + (i % 26)))
      const rope = Rope.from(arr.join(''))

      for (let n = 0; n < 1000; n++) {
        const i = Math.floor(rng() * arr.length)
        const j = i + Math.floor(rng() * Math.min(50, arr.length - i))
        const k = Math.floor(rng() * (arr.length - (j - i + 1) + 1))
        rope.moveRange(i, j, k)
        arr.splice(k, 0, ...arr.splice(i, j - i + 1))
      }

      expect(rope.toString()).toBe(arr.join(''))
      expect(rope.length).toBe(2000)
      checkInvariants(rope._tree)
    })
  })

  describe('insert', () => {
    it('1文字ずつ末尾に挿入', () => {
      const rope = new Rope()
      for (const ch of 'hello') rope.insert(rope.length, ch)
      expect(rope.toString()).toBe('hello')
      expect(rope.length).toBe(5)
    })

    it('先頭に挿入', () => {
      const rope = new Rope()
      rope.insert(0, 'o')
      rope.insert(0, 'l')
      rope.insert(0, 'l')
      rope.insert(0, 'e')
      rope.insert(0, 'h')
      expect(rope.toString()).toBe('hello')
    })

    it('中間に挿入', () => {
      const rope = new Rope()
      rope.insert(0, 'h')
      rope.insert(1, 'o')
      rope.insert(1, 'l')
      rope.insert(1, 'e')
      rope.insert(3, 'l')
      expect(rope.toString()).toBe('hello')
      checkInvariants(rope._tree)
    })

    it('1文字以外は RopeRangeError', () => {
      const rope = Rope.from('ab')
      expect(() => rope.insert(0, '')).toThrow(RopeRangeError)
      expect(() => rope.insert(0, 'xy')).toThrow(RopeRangeError)
      expect(rope.toString()).toBe('ab')
    })

    it('範囲外の位置は RopeRangeError', () => {
      const rope = Rope.from('ab')
      expect(() => rope.insert(3, 'c')).toThrow(RopeRangeError)
      expect(rope.length).toBe(2)
    })
  })

  describe('maxLength', () => {
    it('既定値は符号なし32ビットの最大値', () => {
      expect(new Rope().maxLength).toBe(DEFAULT_MAX_LENGTH)
      expect(DEFAULT_MAX_LENGTH).toBe(4294967295)
    })

    it('上限を超える構築は RopeResourceError', () => {
      expect(() => Rope.from('abc', { maxLength: 2 })).toThrow(RopeResourceError)
      expect(Rope.from('ab', { maxLength: 2 }).toString()).toBe('ab')
    })

    it('上限を超える挿入は RopeResourceError で内容は変わらない', () => {
      const rope = Rope.from('ab', { maxLength: 2 })
      expect(() => rope.insert(2, 'c')).toThrow(RopeResourceError)
      expect(rope.toString()).toBe('ab')
    })

    it('不正な maxLength は RopeRangeError', () => {
      expect(() => new Rope({ maxLength: -1 })).toThrow(RopeRangeError)
      expect(() => new Rope({ maxLength: 1.5 })).toThrow(RopeRangeError)
    })
  })

  describe('dispose', () => {
    it('dispose 後の操作は RopeDisposedError', () => {
      const rope = Rope.from('abc')
      rope.dispose()
      expect(rope.disposed).toBe(true)
      expect(rope.length).toBe(0)
      expect(() => rope.toString()).toThrow(RopeDisposedError)
      expect(() => rope.moveRange(0, 0, 0)).toThrow(RopeDisposedError)
      expect(() => rope.insert(0, 'a')).toThrow(RopeDisposedError)
      expect(() => rope.charAt(0)).toThrow(RopeDisposedError)
    })

    it('2回目の dispose は何もしない', () => {
      const rope = Rope.from('abc')
      rope.dispose()
      expect(() => rope.dispose()).not.toThrow()
    })
  })

  describe('大量操作', () => {
    it('長い文書でも構築・移動・描画できる', () => {
      const source = 'xyz'.repeat(100000)
      const rope = Rope.from(source)
      rope.moveRange(0, 2, source.length - 3)
      rope.moveRange(150000, 299999, 0)
      expect(rope.length).toBe(300000)
      expect(rope.charAt(0)).toBe('x')
      expect(rope.toString()).toBe(source)
    })
  })
})
