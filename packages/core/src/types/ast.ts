// =============================================================================
// PATTERN TREE
// =============================================================================

/**
 * Root of a parsed pattern - the entry point for matching.
 * @public
 */
export interface ParsedPattern {
  /** Original pattern string for error messages and debugging */
  readonly source: string

  /** Parsed structure */
  readonly root: PatternNode

  /** Number of capture groups; group indices run from 1 to this value */
  readonly groupCount: number
}

/**
 * A node in the pattern tree.
 * @public
 */
export type PatternNode = LiteralNode | SequenceNode | AlternationNode | StarNode | PlusNode | GroupNode

/**
 * Matches exactly one occurrence of a single character.
 *
 * @example "a" becomes Literal("a")
 *
 * @public
 */
export interface LiteralNode {
  readonly type: 'literal'

  /** A single Unicode code point */
  readonly value: string
}

/**
 * Sub-patterns matched one after another.
 *
 * An empty sequence matches the empty string.
 *
 * @example
 * "ab*" becomes:
 *   Sequence([Literal("a"), Star(Literal("b"))])
 *
 * @public
 */
export interface SequenceNode {
  readonly type: 'sequence'
  readonly items: readonly PatternNode[]
}

/**
 * Branches separated by `|`, tried left to right.
 *
 * @example
 * "ab|c" becomes:
 *   Alternation([
 *     Sequence([Literal("a"), Literal("b")]),
 *     Literal("c")
 *   ])
 *
 * @public
 */
export interface AlternationNode {
  readonly type: 'alternation'
  readonly branches: readonly PatternNode[]
}

/**
 * Zero or more repetitions of `inner`, greedy.
 * @public
 */
export interface StarNode {
  readonly type: 'star'
  readonly inner: PatternNode
}

/**
 * One or more repetitions of `inner`, greedy. Only produced when the
 * parser runs with `plus` enabled.
 * @public
 */
export interface PlusNode {
  readonly type: 'plus'
  readonly inner: PatternNode
}

/**
 * A parenthesized sub-pattern whose matched text is recorded under `index`.
 *
 * Indices start at 1 and follow the order of opening parentheses.
 *
 * @public
 */
export interface GroupNode {
  readonly type: 'group'
  readonly index: number
  readonly inner: PatternNode
}
