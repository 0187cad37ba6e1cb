/**
 * Structural queries over pattern trees.
 * @packageDocumentation
 */

import type { PatternNode } from '../types'

/**
 * Get the highest capture group index in a tree.
 *
 * For parser-produced trees this equals the number of groups.
 *
 * @public
 */
export function countGroups(node: PatternNode): number {
  switch (node.type) {
    case 'literal':
      return 0

    case 'sequence':
      return maxOf(node.items)

    case 'alternation':
      return maxOf(node.branches)

    case 'star':
    case 'plus':
      return countGroups(node.inner)

    case 'group':
      return Math.max(node.index, countGroups(node.inner))
  }
}

function maxOf(nodes: readonly PatternNode[]): number {
  return nodes.reduce((max, child) => Math.max(max, countGroups(child)), 0)
}
