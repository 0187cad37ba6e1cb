/**
 * Capture table presentation.
 * @packageDocumentation
 */

import type { CaptureTable } from '../types'

/**
 * Render a capture table for display.
 *
 * @example
 *   formatCaptures(new Map([[0, 'ab'], [1, 'a']])) === '{0: "ab", 1: "a"}'
 *
 * @public
 */
export function formatCaptures(table: CaptureTable): string {
  const entries = [...table.entries()]
    .sort(([a], [b]) => a - b)
    .map(([slot, value]) => `${slot}: ${JSON.stringify(value)}`)
  return `{${entries.join(', ')}}`
}

/**
 * Convert a capture table to a plain object keyed by slot.
 *
 * @public
 */
export function capturesToRecord(table: CaptureTable): Record<number, string> {
  const record: Record<number, string> = {}
  for (const [slot, value] of table) {
    record[slot] = value
  }
  return record
}
