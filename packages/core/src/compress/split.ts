/**
 * Path splitting and prefix grouping for the compressor.
 * @packageDocumentation
 */

import type { SplitMode } from '../types'

/**
 * A path split into the prefix it is grouped under and the suffix it contributes.
 * @public
 */
export interface SplitPath {
  readonly prefix: string
  readonly suffix: string
}

/**
 * Remove a single leading slash.
 *
 * @example
 * stripLeadingSlash('/Dev1/ao0') // => 'Dev1/ao0'
 * stripLeadingSlash('//Dev1') // => '/Dev1'
 *
 * @public
 */
export function stripLeadingSlash(path: string): string {
  return path.startsWith('/') ? path.slice(1) : path
}

/**
 * The split mode a single (already stripped) path calls for.
 *
 * @public
 */
export function pathShape(path: string): SplitMode {
  return path.includes('/') ? 'slash' : 'bare'
}

/**
 * Decide the split mode for one level of paths.
 *
 * @param paths - Paths with their leading slash already stripped
 * @returns The shared mode, or `undefined` if the paths mix both shapes
 *
 * @public
 */
export function detectSplitMode(paths: readonly string[]): SplitMode | undefined {
  if (paths.length === 0) {
    return undefined
  }

  const mode = pathShape(paths[0])
  return paths.every((path) => pathShape(path) === mode) ? mode : undefined
}

/**
 * Split a path into prefix and suffix.
 *
 * In `slash` mode the split happens at the first `/` and the suffix is the
 * verbatim remainder. In `bare` mode the prefix is the leading run of
 * non-digit characters and the suffix is everything from the first digit on.
 *
 * @example
 * splitPath('Dev2/port0/line1', 'slash') // => { prefix: 'Dev2', suffix: 'port0/line1' }
 * splitPath('ao12', 'bare') // => { prefix: 'ao', suffix: '12' }
 * splitPath('PFI', 'bare') // => { prefix: 'PFI', suffix: '' }
 *
 * @public
 */
export function splitPath(path: string, mode: SplitMode): SplitPath {
  if (mode === 'slash') {
    const slash = path.indexOf('/')
    return slash < 0 ? { prefix: path, suffix: '' } : { prefix: path.slice(0, slash), suffix: path.slice(slash + 1) }
  }

  const firstDigit = path.search(/\d/)
  if (firstDigit < 0) {
    return { prefix: path, suffix: '' }
  }
  return { prefix: path.slice(0, firstDigit), suffix: path.slice(firstDigit) }
}

/**
 * Group paths by prefix, collecting the distinct suffixes of each prefix.
 *
 * @returns Groups keyed by prefix, in ascending prefix order
 *
 * @public
 */
export function groupByPrefix(paths: readonly string[], mode: SplitMode): ReadonlyMap<string, ReadonlySet<string>> {
  const groups = new Map<string, Set<string>>()

  for (const path of paths) {
    const { prefix, suffix } = splitPath(path, mode)
    const suffixes = groups.get(prefix)
    if (suffixes) {
      suffixes.add(suffix)
    } else {
      groups.set(prefix, new Set([suffix]))
    }
  }

  return new Map([...groups.entries()].sort(([a], [b]) => compareCodeUnits(a, b)))
}

/**
 * Plain code-unit comparison (ASCII order for ASCII names).
 */
function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
