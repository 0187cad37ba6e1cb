/**
 * Error codes for pattern syntax failures.
 * @public
 */
export type PatternErrorCode =
  | 'UNMATCHED_OPEN_PAREN' // (ab without )
  | 'UNMATCHED_CLOSE_PAREN' // ab) or a)(b
  | 'DANGLING_REPETITION' // *a, (*a), a|*b

/**
 * A pattern syntax error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Code point offset in the source where the error starts */
  readonly position: number

  /** Length of the problematic section */
  readonly length: number
}

/**
 * Error thrown when a pattern string is not well-formed.
 *
 * Extends the built-in `SyntaxError`, so callers can catch either.
 *
 * @public
 */
export class PatternSyntaxError extends SyntaxError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Code point offset in the source where the error starts */
  readonly position: number

  /** Length of the problematic section */
  readonly length: number

  /** The pattern that failed to parse */
  readonly source: string

  constructor(code: PatternErrorCode, message: string, source: string, position: number, length = 1) {
    super(`${message} at position ${position} in pattern ${JSON.stringify(source)}`)
    this.name = 'PatternSyntaxError'
    this.code = code
    this.position = position
    this.length = length
    this.source = source
  }

  /**
   * Plain-record form of this error, as reported by `validatePattern`.
   */
  toPatternError(): PatternError {
    return {
      code: this.code,
      message: this.message,
      position: this.position,
      length: this.length,
    }
  }
}
