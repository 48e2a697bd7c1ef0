/**
 * Driver boundary utilities.
 * @packageDocumentation
 */

export { checkReturnCode, formatDriverCall } from './return-codes'
export { createDriverSession } from './session'
