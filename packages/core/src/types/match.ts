/**
 * Substrings captured by a successful match, keyed by slot.
 *
 * Slot 0 is the whole match; slots 1..N are groups in the order their
 * opening parentheses appear. A group that took no part in the successful
 * derivation has no entry. Keys iterate in ascending order.
 *
 * @public
 */
export type CaptureTable = ReadonlyMap<number, string>

/**
 * Called with the position reached so far; returns true once the rest of
 * the match has succeeded.
 * @public
 */
export type Continuation = (position: number) => boolean
