/**
 * Type definitions for the regular expression engine.
 * @packageDocumentation
 */

// Pattern tree types
export type {
  ParsedPattern,
  PatternNode,
  LiteralNode,
  SequenceNode,
  AlternationNode,
  StarNode,
  PlusNode,
  GroupNode,
} from './ast'

// Match types
export type { CaptureTable, Continuation } from './match'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { PatternSyntaxError } from './errors'
