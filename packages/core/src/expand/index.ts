/**
 * Pattern expansion utilities.
 * @packageDocumentation
 */

export { expandPattern, countPatternExpansions, DEFAULT_MAX_EXPANSION, type ExpansionResult } from './expander'
