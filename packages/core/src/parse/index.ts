/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parsePattern, type ParseOptions } from './parser'
export { validatePattern, isValidPattern } from './validator'
export { countGroups } from './tree-utils'
export { formatPattern } from './format'
