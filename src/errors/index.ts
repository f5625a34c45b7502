/**
 * Error Module
 *
 * Error class, pre-built factories and the error code table.
 */

export { Errors } from './factories.js'
export { PromwireError, isPromwireError } from './error.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  getStatusForCode,
  isClientError,
} from './codes.js'
