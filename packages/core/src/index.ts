/**
 * Regular Expression Engine
 *
 * A small backtracking regular expression engine supporting literals,
 * concatenation, alternation, capture groups and repetition. Matches are
 * anchored to the whole input and report each group's captured text.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Pattern tree types
  ParsedPattern,
  PatternNode,
  LiteralNode,
  SequenceNode,
  AlternationNode,
  StarNode,
  PlusNode,
  GroupNode,
  // Match types
  CaptureTable,
  Continuation,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { PatternSyntaxError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parsePattern, type ParseOptions } from './parse'
export { validatePattern, isValidPattern } from './parse'
export { countGroups, formatPattern } from './parse'

// =============================================================================
// Matching
// =============================================================================

export { matchPattern, matchTree, testPattern } from './match'
export { formatCaptures, capturesToRecord } from './match'

// =============================================================================
// Regex
// =============================================================================

export { Regex } from './regex'
