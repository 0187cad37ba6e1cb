/**
 * Pattern validation - reports syntax errors without throwing.
 * @packageDocumentation
 */

import type { PatternError } from '../types'
import { PatternSyntaxError } from '../types'
import { parsePattern, type ParseOptions } from './parser'

/**
 * Validate a pattern string.
 *
 * The parser stops at the first problem, so at most one error is reported.
 *
 * @param source - The pattern string to validate
 * @param options - Parser configuration the pattern will be used with
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string, options: ParseOptions = {}): readonly PatternError[] {
  try {
    parsePattern(source, options)
  } catch (error) {
    if (error instanceof PatternSyntaxError) {
      return [error.toPatternError()]
    }
    throw error
  }
  return []
}

/**
 * Check if a pattern string is valid (has no errors).
 *
 * @param source - The pattern string to check
 * @param options - Parser configuration the pattern will be used with
 * @returns true if the pattern parses
 *
 * @public
 */
export function isValidPattern(source: string, options: ParseOptions = {}): boolean {
  return validatePattern(source, options).length === 0
}
