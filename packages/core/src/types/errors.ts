import type { DriverArgument } from './driver'

/**
 * Error codes for path-list validation and pattern expansion failures.
 * @public
 */
export type PatternErrorCode =
  | 'EMPTY_INPUT' // No paths to compress
  | 'MIXED_PATH_SHAPES' // Slash paths and bare tokens in one call
  | 'UNCLOSED_BRACE' // Dev1/{ai0,ai1 without }
  | 'UNEXPECTED_BRACE' // } without {, or text after a closing brace
  | 'EXPANSION_LIMIT' // Too many expanded paths

/**
 * A validation or expansion error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /**
   * Where the error starts: a character offset for pattern errors,
   * an index into the input for path-list errors
   */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown when a path list violates the compressor's preconditions.
 *
 * @public
 */
export class PathListError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Index of the offending path, when one path is to blame */
  readonly index?: number

  constructor(error: PatternError) {
    super(error.message)
    this.name = 'PathListError'
    this.code = error.code
    this.index = error.position
  }
}

/**
 * Error thrown when a driver call returns a negative status code.
 *
 * @public
 */
export class DriverCallError extends Error {
  /** Full name of the driver function that failed */
  readonly functionName: string

  /** Arguments the function was called with */
  readonly args: readonly DriverArgument[]

  /** The driver's status code (always negative) */
  readonly returnCode: number

  /** Symbolic name of the status code, if known */
  readonly errorName?: string

  /** Text the driver returned for the status code */
  readonly errorText: string

  constructor(
    message: string,
    details: {
      functionName: string
      args: readonly DriverArgument[]
      returnCode: number
      errorName?: string
      errorText: string
    },
  ) {
    super(message)
    this.name = 'DriverCallError'
    this.functionName = details.functionName
    this.args = details.args
    this.returnCode = details.returnCode
    this.errorName = details.errorName
    this.errorText = details.errorText
  }
}
