/**
 * Driver sessions - a library bound to its return-code checks.
 * @packageDocumentation
 */

import type { DriverArgument, DriverLibrary, DriverOptions, DriverSession } from '../types'
import { checkReturnCode } from './return-codes'

/**
 * Bind a driver library to the session options.
 *
 * @example
 * const session = createDriverSession(library, { functionPrefix: 'DAQmx' })
 * session.call('StartTask', handle) // invokes 'DAQmxStartTask'
 *
 * @public
 */
export function createDriverSession(library: DriverLibrary, options: DriverOptions = {}): DriverSession {
  const prefix = options.functionPrefix ?? ''

  return {
    call(functionName: string, ...args: DriverArgument[]): number {
      const call = { functionName: prefix + functionName, args }
      return checkReturnCode(library.invoke(call.functionName, args), call, library, options)
    },
  }
}
