/**
 * Restorable capture storage used during backtracking.
 * @packageDocumentation
 */

import type { CaptureTable } from '../types'

/**
 * Working storage for group captures during one match attempt.
 *
 * Slot 0 is reserved for the whole match and is filled in by
 * `toTable`; slots 1..N hold the latest capture of each group on the
 * derivation currently being explored.
 */
export class CaptureSlots {
  private readonly slots: Array<string | undefined>

  constructor(groupCount: number) {
    this.slots = new Array<string | undefined>(groupCount + 1).fill(undefined)
  }

  /**
   * Record `value` in slot `index` while `body` runs.
   *
   * The prior value is put back on every path where `body` does not report
   * success, including when it throws. On success the new value stays.
   *
   * @returns the result of `body`
   */
  withCapture(index: number, value: string, body: () => boolean): boolean {
    const prior = this.slots[index]
    this.slots[index] = value

    let kept = false
    try {
      kept = body()
      return kept
    } finally {
      if (!kept) {
        this.slots[index] = prior
      }
    }
  }

  /**
   * Snapshot the current slots as a capture table.
   *
   * @param whole - The whole-match text for slot 0
   */
  toTable(whole: string): CaptureTable {
    const table = new Map<number, string>([[0, whole]])
    for (let index = 1; index < this.slots.length; index++) {
      const value = this.slots[index]
      if (value !== undefined) {
        table.set(index, value)
      }
    }
    return table
  }
}
