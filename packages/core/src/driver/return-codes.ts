/**
 * Translation of driver status codes into errors and warnings.
 * @packageDocumentation
 */

import type { DriverArgument, DriverCall, DriverLibrary, DriverOptions } from '../types'
import { DriverCallError } from '../types'

/**
 * Render a driver call for messages.
 *
 * @example
 * formatDriverCall({ functionName: 'StartTask', args: ['ai', 3] })
 * // => 'StartTask("ai", 3)'
 *
 * @public
 */
export function formatDriverCall(call: DriverCall): string {
  return `${call.functionName}(${call.args.map(formatArgument).join(', ')})`
}

function formatArgument(arg: DriverArgument): string {
  if (typeof arg === 'string') {
    return JSON.stringify(arg)
  }
  if (typeof arg === 'bigint') {
    return `${arg}n`
  }
  return String(arg)
}

/**
 * Check the status code returned by a driver call.
 *
 * Zero is success. Negative codes throw a {@link DriverCallError} with the
 * driver's description of the code. Positive codes are warnings: they are
 * logged and returned.
 *
 * @param returnCode - Status code returned by the call
 * @param call - The call that produced it
 * @param library - Used to look up the description of non-zero codes
 * @param options - Error names and logger
 * @returns The status code, if it is not an error
 * @throws DriverCallError if `returnCode` is negative
 *
 * @public
 */
export function checkReturnCode(
  returnCode: number,
  call: DriverCall,
  library: DriverLibrary,
  options: DriverOptions = {},
): number {
  if (returnCode === 0) {
    return returnCode
  }

  const errorText = library.resolveErrorText(returnCode)
  const errorName = options.errorNames?.get(returnCode)
  const callText = formatDriverCall(call)

  if (returnCode < 0) {
    throw new DriverCallError(`${callText} failed with error ${errorName ?? 'unknown'}=${returnCode}: ${errorText}`, {
      functionName: call.functionName,
      args: call.args,
      returnCode,
      errorName,
      errorText,
    })
  }

  const logger = options.logger ?? console
  logger.warn(`${callText} warning: ${errorName ?? returnCode}: ${errorText}`)
  return returnCode
}
