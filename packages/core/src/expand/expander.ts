/**
 * Pattern expansion - the inverse of compression.
 * @packageDocumentation
 */

import type { ExpandOptions, PatternError } from '../types'

/** Default maximum number of expanded paths */
export const DEFAULT_MAX_EXPANSION = 1000

/** Counts above this are reported as Infinity */
const COUNT_LIMIT = 10_000

const RANGE_CLAUSE = /^(.*?)(\d+):(-?\d+)$/

// A signed lower bound can only open a clause or follow a slash
const SIGNED_RANGE_CLAUSE = /^((?:.*\/)?)(-\d+):(-?\d+)$/

/**
 * Result of expanding a pattern.
 * @public
 */
export interface ExpansionResult {
  /** Expanded paths, in pattern order */
  readonly paths: readonly string[]

  /** Errors, if the pattern is malformed or too large */
  readonly errors?: readonly PatternError[]
}

/**
 * Expansion state shared across recursion levels.
 */
interface ExpanderState {
  readonly maxExpansion: number
  count: number
}

/**
 * One comma-separated clause and its offset in the original pattern.
 */
interface Clause {
  readonly text: string
  readonly start: number
}

/**
 * Partial result of expanding part of a pattern.
 */
interface PartialExpansion {
  paths: string[]
  error?: PatternError
}

/**
 * Expand a pattern into the paths it names.
 *
 * @example
 * expandPattern('Dev1/{ai0:1,ao0}').paths
 * // => ['Dev1/ai0', 'Dev1/ai1', 'Dev1/ao0']
 *
 * @example
 * expandPattern('Dev2/port0/line3:1').paths
 * // => ['Dev2/port0/line3', 'Dev2/port0/line2', 'Dev2/port0/line1']
 *
 * @param pattern - A pattern as produced by `compressPaths`
 * @param options - Expansion options
 * @returns The paths, and errors if expansion stopped early
 *
 * @public
 */
export function expandPattern(pattern: string, options: ExpandOptions = {}): ExpansionResult {
  if (pattern === '') {
    return { paths: [] }
  }

  const state: ExpanderState = {
    maxExpansion: options.maxExpansion ?? DEFAULT_MAX_EXPANSION,
    count: 0,
  }

  const expanded = expandList(pattern, 0, state)
  return expanded.error ? { paths: expanded.paths, errors: [expanded.error] } : { paths: expanded.paths }
}

/**
 * Expand a comma-separated list of clauses.
 */
function expandList(source: string, offset: number, state: ExpanderState): PartialExpansion {
  const split = splitClauses(source, offset)
  const paths: string[] = []

  for (const clause of split.clauses) {
    const expanded = expandClause(clause, state)
    paths.push(...expanded.paths)
    if (expanded.error) {
      return { paths, error: expanded.error }
    }
  }

  return split.error ? { paths, error: split.error } : { paths }
}

/**
 * Expand a single clause: a braced group, a numeric range, or a literal.
 */
function expandClause(clause: Clause, state: ExpanderState): PartialExpansion {
  const { text, start } = clause
  const open = text.indexOf('{')

  if (open >= 0) {
    const close = findMatchingBrace(text, open)
    if (close < 0) {
      return { paths: [], error: unclosedBrace(start + open) }
    }
    if (close !== text.length - 1) {
      return {
        paths: [],
        error: {
          code: 'UNEXPECTED_BRACE',
          message: 'A braced group must end its clause',
          position: start + close + 1,
          length: text.length - close - 1,
        },
      }
    }

    const prefix = text.slice(0, open)
    const inner = expandList(text.slice(open + 1, close), start + open + 1, state)
    return { paths: inner.paths.map((path) => prefix + path), error: inner.error }
  }

  const range = parseRangeClause(text)
  if (range) {
    const { prefix, first, last } = range
    const step = first <= last ? 1n : -1n
    const count = Number(rangeSize(range))

    if (state.count + count > state.maxExpansion) {
      return { paths: [], error: expansionLimit(state.maxExpansion, start, text.length) }
    }
    state.count += count

    const paths: string[] = []
    for (let n = first; step > 0n ? n <= last : n >= last; n += step) {
      paths.push(prefix + String(n))
    }
    return { paths }
  }

  if (state.count + 1 > state.maxExpansion) {
    return { paths: [], error: expansionLimit(state.maxExpansion, start, text.length) }
  }
  state.count++
  return { paths: [text] }
}

/**
 * Split a `prefix<first>:<last>` clause.
 */
function parseRangeClause(text: string): { prefix: string; first: bigint; last: bigint } | undefined {
  const range = SIGNED_RANGE_CLAUSE.exec(text) ?? RANGE_CLAUSE.exec(text)
  if (!range) {
    return undefined
  }
  return { prefix: range[1], first: BigInt(range[2]), last: BigInt(range[3]) }
}

function rangeSize(range: { first: bigint; last: bigint }): bigint {
  const span = range.last - range.first
  return (span < 0n ? -span : span) + 1n
}

/**
 * Split content by top-level commas (not inside braces).
 */
function splitClauses(source: string, offset: number): { clauses: Clause[]; error?: PatternError } {
  const clauses: Clause[] = []
  const openers: number[] = []
  let clauseStart = 0

  for (let i = 0; i < source.length; i++) {
    const char = source[i]

    if (char === '{') {
      openers.push(i)
    } else if (char === '}') {
      if (openers.length === 0) {
        return {
          clauses,
          error: {
            code: 'UNEXPECTED_BRACE',
            message: 'Closing brace without a matching opening brace',
            position: offset + i,
            length: 1,
          },
        }
      }
      openers.pop()
    } else if (char === ',' && openers.length === 0) {
      clauses.push({ text: source.slice(clauseStart, i), start: offset + clauseStart })
      clauseStart = i + 1
    }
  }

  if (openers.length > 0) {
    return { clauses, error: unclosedBrace(offset + openers[0]) }
  }

  clauses.push({ text: source.slice(clauseStart), start: offset + clauseStart })
  return { clauses }
}

/**
 * Find the brace closing the one at `open`, or -1.
 */
function findMatchingBrace(text: string, open: number): number {
  let depth = 0

  for (let i = open; i < text.length; i++) {
    if (text[i] === '{') {
      depth++
    } else if (text[i] === '}') {
      depth--
      if (depth === 0) {
        return i
      }
    }
  }

  return -1
}

function unclosedBrace(position: number): PatternError {
  return { code: 'UNCLOSED_BRACE', message: 'Opening brace is never closed', position, length: 1 }
}

function expansionLimit(maxExpansion: number, position: number, length: number): PatternError {
  return {
    code: 'EXPANSION_LIMIT',
    message: `Pattern expansion exceeds limit of ${maxExpansion}`,
    position,
    length,
  }
}

/**
 * Count the number of paths a pattern expands to.
 * Does not actually expand - useful for limit checking.
 *
 * Malformed parts are counted as literals.
 *
 * @param pattern - Pattern source string
 * @returns Path count, or Infinity if it would exceed reasonable limits
 *
 * @public
 */
export function countPatternExpansions(pattern: string): number {
  if (pattern === '') {
    return 0
  }
  const count = countList(pattern)
  return count > COUNT_LIMIT ? Infinity : count
}

function countList(source: string): number {
  let total = 0
  for (const clause of splitClauses(source, 0).clauses) {
    total += countClause(clause.text)
    if (total > COUNT_LIMIT) {
      return total
    }
  }
  return total
}

function countClause(text: string): number {
  const open = text.indexOf('{')
  if (open >= 0) {
    const close = findMatchingBrace(text, open)
    return close < 0 ? 1 : countList(text.slice(open + 1, close))
  }

  const range = parseRangeClause(text)
  if (range) {
    return Number(rangeSize(range))
  }
  return 1
}
