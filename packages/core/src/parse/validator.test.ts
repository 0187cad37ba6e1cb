import { describe, it, expect } from 'vitest'

import { validatePattern, isValidPattern } from './validator'

describe('validatePattern', () => {
  it('returns empty array for valid patterns', () => {
    const valid = ['', 'a', '(a|b)*', '(a|b)((c|d)*)', 'a|', '()', 'x y 1']

    for (const src of valid) {
      expect(validatePattern(src), `Expected no errors for ${src}`).toEqual([])
    }
  })

  it('reports the syntax error as a record', () => {
    expect(validatePattern('(a|b')).toEqual([
      {
        code: 'UNMATCHED_OPEN_PAREN',
        message: `Unmatched '(' at position 0 in pattern "(a|b"`,
        position: 0,
        length: 4,
      },
    ])
  })

  it('detects dangling repetition', () => {
    const errors = validatePattern('a|*')

    expect(errors).toHaveLength(1)
    expect(errors[0].code).toBe('DANGLING_REPETITION')
    expect(errors[0].position).toBe(2)
  })

  it('detects unmatched closing parenthesis', () => {
    expect(validatePattern('ab)')[0].code).toBe('UNMATCHED_CLOSE_PAREN')
  })
})

describe('isValidPattern', () => {
  it('returns true for valid patterns', () => {
    expect(isValidPattern('(a(b|c))*')).toBe(true)
    expect(isValidPattern('+a')).toBe(true)
    expect(isValidPattern('a+', { plus: true })).toBe(true)
  })

  it('returns false for invalid patterns', () => {
    expect(isValidPattern('(a')).toBe(false)
    expect(isValidPattern('*a')).toBe(false)
    expect(isValidPattern('+a', { plus: true })).toBe(false)
  })
})
