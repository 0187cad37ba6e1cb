import { describe, it, expect } from 'vitest'

import { parsePattern } from './parser'
import { formatPattern } from './format'
import type { PatternNode } from '../types'

const lit = (value: string): PatternNode => ({ type: 'literal', value })

describe('formatPattern', () => {
  it('renders parsed patterns back to their source', () => {
    const sources = ['', 'a', 'abc', 'a|b|', '(a|b)((c|d)*)', 'a**', '()', '(|a)*b', ' x ', '😀(😀)*']

    for (const source of sources) {
      expect(formatPattern(parsePattern(source).root), `Expected ${source} to round-trip`).toBe(source)
    }
  })

  it('renders one-or-more as +', () => {
    expect(formatPattern(parsePattern('(ab)+c', { plus: true }).root)).toBe('(ab)+c')
  })

  it('renders a hand-built tree', () => {
    const tree: PatternNode = {
      type: 'alternation',
      branches: [
        { type: 'sequence', items: [lit('x'), { type: 'star', inner: lit('y') }] },
        { type: 'group', index: 1, inner: lit('z') },
      ],
    }

    expect(formatPattern(tree)).toBe('xy*|(z)')
  })

  describe('trees without a pattern spelling', () => {
    it('rejects repetition of a bare sequence', () => {
      const tree: PatternNode = { type: 'star', inner: { type: 'sequence', items: [lit('a'), lit('b')] } }

      expect(() => formatPattern(tree)).toThrow('A star cannot repeat a bare sequence')
    })

    it('rejects an alternation directly inside a sequence', () => {
      const tree: PatternNode = {
        type: 'sequence',
        items: [lit('a'), { type: 'alternation', branches: [lit('b'), lit('c')] }],
      }

      expect(() => formatPattern(tree)).toThrow(TypeError)
    })

    it('rejects metacharacter and multi-character literals', () => {
      expect(() => formatPattern(lit('|'))).toThrow('Literal "|" has no pattern spelling')
      expect(() => formatPattern(lit('ab'))).toThrow(TypeError)
    })
  })
})
