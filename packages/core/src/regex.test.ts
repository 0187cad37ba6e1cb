import { describe, it, expect } from 'vitest'

import { Regex } from './regex'
import { parsePattern } from './parse'
import { formatCaptures } from './match'
import { PatternSyntaxError } from './types'

describe('Regex', () => {
  describe('construction', () => {
    it('exposes the source and group count', () => {
      const regex = Regex.fromString('(a|b)((c|d)*)')

      expect(regex.source).toBe('(a|b)((c|d)*)')
      expect(regex.groupCount).toBe(3)
      expect(regex.toString()).toBe('(a|b)((c|d)*)')
    })

    it('exposes the parsed tree', () => {
      expect(new Regex('ab|c').tree).toEqual(parsePattern('ab|c').root)
    })

    it('fails on unbalanced parentheses', () => {
      expect(() => Regex.fromString('(a|b')).toThrow(PatternSyntaxError)
      expect(() => Regex.fromString('a)')).toThrow(SyntaxError)
    })

    it('fails on dangling repetition', () => {
      expect(() => Regex.fromString('*a')).toThrow(PatternSyntaxError)
    })

    it('passes parse options through', () => {
      expect(Regex.fromString('a+', { plus: true }).test('aaa')).toBe(true)
      expect(Regex.fromString('a+').test('a+')).toBe(true)
      expect(Regex.fromString('a+').test('aa')).toBe(false)
    })
  })

  describe('match', () => {
    it('returns the capture table on success', () => {
      const table = Regex.fromString('(a|b)((c|d)*)').match('bcddc')

      expect(formatCaptures(table ?? new Map<number, string>())).toBe('{0: "bcddc", 1: "b", 2: "cddc", 3: "c"}')
    })

    it('returns null on failure', () => {
      expect(Regex.fromString('(a|b)((c|d)*)').match('xyz')).toBeNull()
    })

    it('anchors to the whole input', () => {
      expect(Regex.fromString('a').match('ab')).toBeNull()
    })

    it('distinguishes an empty match from no match', () => {
      const regex = Regex.fromString('a*')

      expect(regex.match('')).toEqual(new Map([[0, '']]))
      expect(regex.match('b')).toBeNull()
    })

    it('can be reused across inputs', () => {
      const regex = Regex.fromString('(a*)bc')

      expect(regex.match('aabc')).toEqual(
        new Map([
          [0, 'aabc'],
          [1, 'aa'],
        ]),
      )
      expect(regex.match('bc')).toEqual(
        new Map([
          [0, 'bc'],
          [1, ''],
        ]),
      )
    })
  })

  describe('test', () => {
    it('reports whether the whole input matches', () => {
      const regex = Regex.fromString('x(y|z)*')

      expect(regex.test('xyzzy')).toBe(true)
      expect(regex.test('xyzzyx')).toBe(false)
    })
  })
})
