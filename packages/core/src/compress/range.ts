/**
 * Integer suffix parsing and contiguous range formatting.
 * @packageDocumentation
 */

import { multirange } from 'multi-integer-range'

const INTEGER_PATTERN = /^([+-]?)(\d+)$/

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

/**
 * Parse a suffix as a decimal integer of any size.
 *
 * @example
 * parseIntegerSuffix('07') // => 7n
 * parseIntegerSuffix('1a') // => undefined
 *
 * @returns The integer, or `undefined` if the text is not a decimal integer
 *
 * @public
 */
export function parseIntegerSuffix(text: string): bigint | undefined {
  const match = INTEGER_PATTERN.exec(text)
  if (!match) {
    return undefined
  }

  const magnitude = BigInt(match[2])
  return match[1] === '-' ? -magnitude : magnitude
}

/**
 * Format a set of integers as a single range, if it has no gaps.
 *
 * Duplicates are ignored.
 *
 * @example
 * formatContiguousRange([3n, 1n, 2n]) // => '1:3'
 * formatContiguousRange([4n, 4n]) // => '4'
 * formatContiguousRange([1n, 3n]) // => undefined
 *
 * @returns `min:max`, `min` when all values are equal, or `undefined` for gaps or an empty set
 *
 * @public
 */
export function formatContiguousRange(values: readonly bigint[]): string | undefined {
  const bounds = values.every(isSafe) ? safeBounds(values) : largeBounds(values)
  if (bounds === undefined) {
    return undefined
  }

  const [min, max] = bounds
  return min === max ? String(min) : `${min}:${max}`
}

function isSafe(value: bigint): boolean {
  return value >= MIN_SAFE && value <= MAX_SAFE
}

/**
 * Bounds of a gap-free set of safe integers.
 */
function safeBounds(values: readonly bigint[]): [bigint, bigint] | undefined {
  const range = multirange(values.map(Number))
  if (range.segmentLength() !== 1) {
    return undefined
  }

  const min = range.min()
  const max = range.max()
  return min === undefined || max === undefined ? undefined : [BigInt(min), BigInt(max)]
}

/**
 * Bounds of a gap-free set that reaches beyond the safe-integer range.
 */
function largeBounds(values: readonly bigint[]): [bigint, bigint] | undefined {
  const unique = [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
  if (unique.length === 0) {
    return undefined
  }

  const min = unique[0]
  const max = unique[unique.length - 1]
  return max - min + 1n === BigInt(unique.length) ? [min, max] : undefined
}

/**
 * Format integer suffix strings as a single range.
 *
 * @returns The range, or `undefined` if any suffix is not an integer or the values have gaps
 *
 * @public
 */
export function formatSuffixRange(suffixes: Iterable<string>): string | undefined {
  const values: bigint[] = []
  for (const suffix of suffixes) {
    const value = parseIntegerSuffix(suffix)
    if (value === undefined) {
      return undefined
    }
    values.push(value)
  }
  return formatContiguousRange(values)
}
