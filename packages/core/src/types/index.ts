/**
 * Type definitions for channel patterns and the driver boundary.
 * @packageDocumentation
 */

// Compression types
export type {
  SplitMode,
  Compressed,
  NoCompactForm,
  CompressionResult,
  CompressOptions,
  ExpandOptions,
} from './compression'

// Driver types
export type {
  DriverArgument,
  DriverLibrary,
  DriverLogger,
  DriverOptions,
  DriverCall,
  DriverSession,
} from './driver'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { PathListError, DriverCallError } from './errors'
