/**
 * Matching utilities.
 * @packageDocumentation
 */

export { matchPattern, matchTree, testPattern } from './matcher'
export { formatCaptures, capturesToRecord } from './capture-table'
