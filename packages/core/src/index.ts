/**
 * Channel Pattern Library
 *
 * A library for folding lists of hardware channel paths into compact
 * patterns (`Dev1/{ai0:3,ao0:1}`), expanding such patterns back into paths,
 * and checking the status codes of the driver calls that use them.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Compression types
  SplitMode,
  Compressed,
  NoCompactForm,
  CompressionResult,
  CompressOptions,
  ExpandOptions,
  // Driver types
  DriverArgument,
  DriverLibrary,
  DriverLogger,
  DriverOptions,
  DriverCall,
  DriverSession,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { PathListError, DriverCallError } from './types'

// =============================================================================
// Compression
// =============================================================================

export { compressPaths, tryCompressPaths } from './compress'
export { validatePathList, isCompressible } from './compress'
export { stripLeadingSlash, pathShape, detectSplitMode, splitPath, groupByPrefix, type SplitPath } from './compress'
export { parseIntegerSuffix, formatContiguousRange, formatSuffixRange } from './compress'

// =============================================================================
// Expansion
// =============================================================================

export { expandPattern, countPatternExpansions, DEFAULT_MAX_EXPANSION, type ExpansionResult } from './expand'

// =============================================================================
// Driver Boundary
// =============================================================================

export { checkReturnCode, formatDriverCall, createDriverSession } from './driver'
