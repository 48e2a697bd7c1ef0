/**
 * A value passed through to a driver entry point.
 * @public
 */
export type DriverArgument = string | number | bigint | boolean | null

/**
 * The native driver as seen from this library. Marshalling and buffer
 * handling live behind this interface.
 *
 * @public
 */
export interface DriverLibrary {
  /** Call the named entry point and return its status code */
  invoke(functionName: string, args: readonly DriverArgument[]): number

  /** Look up the driver's description of a status code */
  resolveErrorText(returnCode: number): string
}

/**
 * Sink for driver warnings (positive status codes).
 * @public
 */
export interface DriverLogger {
  warn(message: string): void
}

/**
 * Options for return-code checking and driver sessions.
 * @public
 */
export interface DriverOptions {
  /**
   * Prepended to every function name a session calls.
   * @defaultValue ''
   */
  readonly functionPrefix?: string

  /** Symbolic names for status codes, used in messages */
  readonly errorNames?: ReadonlyMap<number, string>

  /**
   * Receives warning messages.
   * @defaultValue console
   */
  readonly logger?: DriverLogger
}

/**
 * One driver call, as reported in errors and warnings.
 * @public
 */
export interface DriverCall {
  readonly functionName: string
  readonly args: readonly DriverArgument[]
}

/**
 * A bound driver whose calls throw on error codes and log warnings.
 * @public
 */
export interface DriverSession {
  /**
   * Invoke `functionName` (with the session's prefix) and check its status.
   * @returns The status code: `0`, or a positive warning code
   */
  call(functionName: string, ...args: DriverArgument[]): number
}
