/**
 * Compiled regular expression handle.
 * @packageDocumentation
 */

import type { CaptureTable, ParsedPattern, PatternNode } from './types'
import { parsePattern, type ParseOptions } from './parse'
import { matchPattern } from './match'

/**
 * A regular expression parsed once and matched any number of times.
 *
 * Instances are immutable; concurrent `match` calls do not share state.
 *
 * @example
 *   const regex = Regex.fromString('(a|b)((c|d)*)')
 *   regex.match('bcddc') // Map { 0 => 'bcddc', 1 => 'b', 2 => 'cddc', 3 => 'c' }
 *   regex.match('xyz') // null
 *
 * @public
 */
export class Regex {
  private readonly pattern: ParsedPattern

  /**
   * @throws PatternSyntaxError if `source` is malformed
   */
  constructor(source: string, options: ParseOptions = {}) {
    this.pattern = parsePattern(source, options)
  }

  /**
   * Parse a pattern string.
   *
   * @throws PatternSyntaxError if `source` is malformed
   */
  static fromString(source: string, options: ParseOptions = {}): Regex {
    return new Regex(source, options)
  }

  /** The pattern string this expression was built from */
  get source(): string {
    return this.pattern.source
  }

  /** Number of capture groups */
  get groupCount(): number {
    return this.pattern.groupCount
  }

  /** The parsed pattern tree */
  get tree(): PatternNode {
    return this.pattern.root
  }

  /**
   * Match the whole of `input`.
   *
   * @returns Captured substrings by slot, or null when `input` does not match
   */
  match(input: string): CaptureTable | null {
    return matchPattern(this.pattern, input)
  }

  /**
   * Check whether the whole of `input` matches.
   */
  test(input: string): boolean {
    return this.match(input) !== null
  }

  toString(): string {
    return this.pattern.source
  }
}
