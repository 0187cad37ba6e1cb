/**
 * Pattern formatting - renders a pattern tree back to pattern syntax.
 * @packageDocumentation
 */

import type { PatternNode } from '../types'

const METACHARACTERS = new Set(['(', ')', '|', '*'])

/**
 * Render a pattern tree as a pattern string.
 *
 * Trees produced by `parsePattern` always render to a string that parses
 * back to an equal tree. Hand-built trees that have no spelling in the
 * pattern language (a repetition over a bare sequence, an alternation
 * nested directly inside a sequence) are rejected. `plus` nodes render as
 * `+` and need `{ plus: true }` to parse back.
 *
 * @example
 *   formatPattern(parsePattern('(a|b)((c|d)*)').root) === '(a|b)((c|d)*)'
 *
 * @param node - Tree to render
 * @returns Pattern source
 * @throws TypeError if the tree cannot be written in pattern syntax
 *
 * @public
 */
export function formatPattern(node: PatternNode): string {
  switch (node.type) {
    case 'literal':
      if (Array.from(node.value).length !== 1 || METACHARACTERS.has(node.value)) {
        throw new TypeError(`Literal ${JSON.stringify(node.value)} has no pattern spelling`)
      }
      return node.value

    case 'sequence':
      return node.items
        .map((item) => {
          if (item.type === 'alternation' || item.type === 'sequence') {
            throw new TypeError(`A ${item.type} cannot appear directly inside a sequence`)
          }
          return formatPattern(item)
        })
        .join('')

    case 'alternation':
      return node.branches
        .map((branch) => {
          if (branch.type === 'alternation') {
            throw new TypeError('An alternation cannot appear directly inside an alternation')
          }
          return formatPattern(branch)
        })
        .join('|')

    case 'star':
    case 'plus': {
      const { inner } = node
      if (inner.type === 'alternation' || inner.type === 'sequence') {
        throw new TypeError(`A ${node.type} cannot repeat a bare ${inner.type}`)
      }
      return formatPattern(inner) + (node.type === 'star' ? '*' : '+')
    }

    case 'group':
      return `(${formatPattern(node.inner)})`
  }
}
