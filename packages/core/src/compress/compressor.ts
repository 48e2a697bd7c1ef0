/**
 * Path compressor - folds lists of channel paths into compact patterns.
 * @packageDocumentation
 */

import type { CompressionResult, CompressOptions, SplitMode } from '../types'
import { PathListError } from '../types'
import { formatSuffixRange } from './range'
import { detectSplitMode, groupByPrefix, stripLeadingSlash } from './split'
import { validatePathList } from './validator'

const NO_COMPACT_FORM: CompressionResult = { kind: 'no-compact-form' }

/**
 * Compress a list of paths into the shortest pattern that names them all.
 *
 * Paths sharing a prefix are grouped (`Dev1/{ai0,ao0}`) and contiguous
 * numeric suffixes become ranges (`Dev1/ao0:7`). When some group has no
 * compact form, the result is the input joined by commas, unchanged.
 *
 * @example
 * compressPaths(['Dev1/ao0', 'Dev1/ao1', 'Dev1/ai0'])
 * // => 'Dev1/{ai0,ao0:1}'
 *
 * @example
 * compressPaths(['Dev1/ao0', 'Dev1/ao2'])
 * // => 'Dev1/ao0,Dev1/ao2'
 *
 * @param paths - Paths to compress; either all contain `/` or none do
 * @param options - Compression options
 * @returns The pattern, or the comma-joined input
 * @throws PathListError if `paths` is empty, or mixes shapes under the default `onMixedShapes`
 *
 * @public
 */
export function compressPaths(paths: readonly string[], options: CompressOptions = {}): string {
  const result = tryCompressPaths(paths, options)
  return result.kind === 'compressed' ? result.pattern : paths.join(',')
}

/**
 * Compress a list of paths without falling back to enumeration.
 *
 * @param paths - Paths to compress; either all contain `/` or none do
 * @param options - Compression options
 * @returns The pattern, or `no-compact-form`
 * @throws PathListError under the same conditions as {@link compressPaths}
 *
 * @public
 */
export function tryCompressPaths(paths: readonly string[], options: CompressOptions = {}): CompressionResult {
  const onMixedShapes = options.onMixedShapes ?? 'reject'

  for (const error of validatePathList(paths)) {
    if (error.code === 'MIXED_PATH_SHAPES' && onMixedShapes === 'enumerate') {
      return NO_COMPACT_FORM
    }
    throw new PathListError(error)
  }

  const stripped = paths.map(stripLeadingSlash)
  const mode = detectSplitMode(stripped)
  return mode === undefined ? NO_COMPACT_FORM : compressLevel(stripped, mode)
}

/**
 * Compress one level: group by prefix and emit one clause per prefix.
 */
function compressLevel(paths: readonly string[], mode: SplitMode): CompressionResult {
  const clauses: string[] = []

  for (const [prefix, suffixSet] of groupByPrefix(paths, mode)) {
    const suffixes = [...suffixSet]
    const clause = suffixes.length === 1 ? singleClause(prefix, suffixes[0], mode) : groupClause(prefix, suffixes, mode)
    if (clause === undefined) {
      return NO_COMPACT_FORM
    }
    clauses.push(clause)
  }

  return { kind: 'compressed', pattern: clauses.join(',') }
}

/**
 * Clause for a prefix with exactly one suffix.
 */
function singleClause(prefix: string, suffix: string, mode: SplitMode): string {
  if (suffix === '') {
    return prefix
  }
  return mode === 'slash' ? `${prefix}/${suffix}` : prefix + suffix
}

/**
 * Clause for a prefix with several suffixes.
 *
 * An empty prefix means the suffixes are the numbers of a range; otherwise
 * the suffixes are compressed one level down.
 */
function groupClause(prefix: string, suffixes: readonly string[], mode: SplitMode): string | undefined {
  if (prefix === '') {
    return formatSuffixRange(suffixes)
  }

  // Each level strips its own leading slash; suffixes from a slash split may also mix shapes
  const children = suffixes.map(stripLeadingSlash)
  const childMode = detectSplitMode(children)
  if (childMode === undefined) {
    return undefined
  }

  const nested = compressLevel(children, childMode)
  if (nested.kind === 'no-compact-form') {
    return undefined
  }

  const body = nested.pattern.includes(',') ? `{${nested.pattern}}` : nested.pattern
  return mode === 'slash' ? `${prefix}/${body}` : prefix + body
}
