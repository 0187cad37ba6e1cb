/**
 * Pattern parser - converts regular expression strings to a pattern tree.
 * @packageDocumentation
 */

import type { ParsedPattern, PatternNode } from '../types'
import { PatternSyntaxError } from '../types'

/**
 * Options for pattern parsing.
 *
 * @public
 */
export interface ParseOptions {
  /**
   * Treat `+` as a one-or-more repetition operator instead of a literal.
   * @defaultValue false
   */
  plus?: boolean
}

/**
 * Parser state for tracking position and group numbering.
 */
interface ParserState {
  source: string
  /** Pattern split into code points */
  chars: readonly string[]
  position: number
  groupCount: number
  plus: boolean
}

/**
 * Parse a pattern string into a pattern tree.
 *
 * Grammar, lowest precedence first:
 *   expression := sequence ('|' sequence)*
 *   sequence   := factor*
 *   factor     := atom ('*')*
 *   atom       := literal | '(' expression ')'
 *
 * @param source - The pattern string to parse
 * @param options - Optional parser configuration
 * @returns Parsed pattern with its tree and group count
 * @throws PatternSyntaxError if the pattern is malformed
 *
 * @public
 */
export function parsePattern(source: string, options: ParseOptions = {}): ParsedPattern {
  const state: ParserState = {
    source,
    chars: Array.from(source),
    position: 0,
    groupCount: 0,
    plus: options.plus ?? false,
  }

  const root = parseExpression(state)

  // The expression parser only stops early at a ')' it cannot pair
  if (state.position < state.chars.length) {
    throw new PatternSyntaxError('UNMATCHED_CLOSE_PAREN', "Unmatched ')'", source, state.position)
  }

  return {
    source,
    root,
    groupCount: state.groupCount,
  }
}

function peek(state: ParserState): string | undefined {
  return state.chars[state.position]
}

function isRepetition(state: ParserState, char: string | undefined): boolean {
  return char === '*' || (state.plus && char === '+')
}

/**
 * Parse `|`-separated branches. A single branch is returned unwrapped.
 */
function parseExpression(state: ParserState): PatternNode {
  const branches: PatternNode[] = [parseSequence(state)]

  while (peek(state) === '|') {
    state.position++
    branches.push(parseSequence(state))
  }

  if (branches.length === 1) {
    return branches[0]
  }
  return { type: 'alternation', branches }
}

/**
 * Parse factors up to the next `|`, `)` or end of input.
 */
function parseSequence(state: ParserState): PatternNode {
  const items: PatternNode[] = []

  for (let char = peek(state); char !== undefined && char !== '|' && char !== ')'; char = peek(state)) {
    items.push(parseFactor(state, char))
  }

  if (items.length === 1) {
    return items[0]
  }
  return { type: 'sequence', items }
}

/**
 * Parse an atom followed by any number of repetition operators.
 */
function parseFactor(state: ParserState, first: string): PatternNode {
  let node = parseAtom(state, first)

  for (let char = peek(state); isRepetition(state, char); char = peek(state)) {
    state.position++
    node = char === '*' ? { type: 'star', inner: node } : { type: 'plus', inner: node }
  }

  return node
}

/**
 * Parse the atom starting with `char`, the code point at the current position.
 */
function parseAtom(state: ParserState, char: string): PatternNode {
  const start = state.position

  if (isRepetition(state, char)) {
    throw new PatternSyntaxError('DANGLING_REPETITION', `'${char}' requires a preceding atom`, state.source, start)
  }

  state.position++

  if (char !== '(') {
    return { type: 'literal', value: char }
  }

  // Number the group before descending so outer groups come first
  const index = ++state.groupCount
  const inner = parseExpression(state)

  if (peek(state) !== ')') {
    throw new PatternSyntaxError(
      'UNMATCHED_OPEN_PAREN',
      "Unmatched '('",
      state.source,
      start,
      state.position - start,
    )
  }
  state.position++

  return { type: 'group', index, inner }
}
