/**
 * Pattern matching - backtracking search over pattern trees.
 * @packageDocumentation
 */

import type { CaptureTable, Continuation, ParsedPattern, PatternNode } from '../types'
import { countGroups } from '../parse/tree-utils'
import { CaptureSlots } from './capture-slots'

/**
 * State shared by every step of one match attempt.
 */
interface MatchContext {
  /** Input split into code points; positions index into this */
  readonly chars: readonly string[]
  readonly slots: CaptureSlots
}

/**
 * Match a whole input string against a parsed pattern.
 *
 * The match is anchored at both ends: it succeeds only if some derivation
 * consumes the input from its first character through its last.
 *
 * @param pattern - Parsed pattern
 * @param input - String to match
 * @returns Capture table for the first successful derivation, or null if there is none
 *
 * @public
 */
export function matchPattern(pattern: ParsedPattern, input: string): CaptureTable | null {
  return run(pattern.root, pattern.groupCount, input)
}

/**
 * Match a whole input string against a pattern tree.
 *
 * Like `matchPattern`, for trees built without the parser.
 *
 * @public
 */
export function matchTree(root: PatternNode, input: string): CaptureTable | null {
  return run(root, countGroups(root), input)
}

/**
 * Test if a whole input string matches a parsed pattern.
 *
 * @public
 */
export function testPattern(pattern: ParsedPattern, input: string): boolean {
  return matchPattern(pattern, input) !== null
}

function run(root: PatternNode, groupCount: number, input: string): CaptureTable | null {
  const context: MatchContext = {
    chars: Array.from(input),
    slots: new CaptureSlots(groupCount),
  }

  const matched = matchNode(root, 0, context, (position) => position === context.chars.length)
  return matched ? context.slots.toTable(input) : null
}

/**
 * Try to advance through `node` from `position`, calling `next` at each
 * position the node can end at until one call succeeds.
 *
 * Candidates are tried in precedence order: alternation branches left to
 * right, repetitions greedily.
 */
function matchNode(node: PatternNode, position: number, context: MatchContext, next: Continuation): boolean {
  switch (node.type) {
    case 'literal':
      return position < context.chars.length && context.chars[position] === node.value && next(position + 1)

    case 'sequence':
      return matchItems(node.items, 0, position, context, next)

    case 'alternation':
      return node.branches.some((branch) => matchNode(branch, position, context, next))

    case 'star':
      return matchRepeat(node.inner, position, context, next)

    case 'plus':
      return matchNode(node.inner, position, context, (after) =>
        after === position ? next(after) : matchRepeat(node.inner, after, context, next),
      )

    case 'group':
      return matchNode(node.inner, position, context, (end) =>
        context.slots.withCapture(node.index, context.chars.slice(position, end).join(''), () => next(end)),
      )
  }
}

/**
 * Match `items[index..]` in order, each continuing where the previous ended.
 */
function matchItems(
  items: readonly PatternNode[],
  index: number,
  position: number,
  context: MatchContext,
  next: Continuation,
): boolean {
  if (index >= items.length) {
    return next(position)
  }

  return matchNode(items[index], position, context, (after) => matchItems(items, index + 1, after, context, next))
}

/**
 * Zero or more repetitions of `inner`, more before fewer.
 *
 * An iteration that ends where it started does not recurse; it hands its
 * end position straight to `next`, so the search always terminates.
 */
function matchRepeat(inner: PatternNode, position: number, context: MatchContext, next: Continuation): boolean {
  const repeated = matchNode(inner, position, context, (after) =>
    after === position ? next(after) : matchRepeat(inner, after, context, next),
  )

  return repeated || next(position)
}
