/**
 * Path list validation - checks the compressor's input preconditions.
 * @packageDocumentation
 */

import type { PatternError } from '../types'
import { pathShape, stripLeadingSlash } from './split'

/**
 * Validate a list of paths before compression.
 *
 * Returns errors for:
 * - An empty list
 * - A list mixing slash paths (`Dev1/ao0`) with bare tokens (`ao0`)
 *
 * Only the top level is checked; mixed shapes further down are not an
 * error but leave the list without a compact form.
 *
 * @param paths - The paths to validate
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validatePathList(paths: readonly string[]): readonly PatternError[] {
  if (paths.length === 0) {
    return [{ code: 'EMPTY_INPUT', message: 'Cannot compress an empty path list' }]
  }

  const shape = pathShape(stripLeadingSlash(paths[0]))
  const mismatch = paths.findIndex((path) => pathShape(stripLeadingSlash(path)) !== shape)
  if (mismatch >= 0) {
    return [
      {
        code: 'MIXED_PATH_SHAPES',
        message: `Path "${paths[mismatch]}" is a ${shape === 'slash' ? 'bare token' : 'slash path'} but "${paths[0]}" is not`,
        position: mismatch,
      },
    ]
  }

  return []
}

/**
 * Check if a path list can be passed to the compressor.
 *
 * @public
 */
export function isCompressible(paths: readonly string[]): boolean {
  return validatePathList(paths).length === 0
}
