export { BaseError, type BaseErrorOptions, serializeError, type SerializeOptions } from "./core/base-error"
export { type InspectOptions, inspectThrowable } from "./core/inspect/inspect-throwable"
export { stackFrames } from "./core/inspect/stack-frames"
export { errorTypeName, NON_ERROR_TYPE_NAME } from "./core/inspect/type-name"
export { causeOf, errorChain } from "./core/utils/error-chain"
export type {
  AppError,
  ErrorCode,
  ErrorContext,
  InspectedThrowable,
  SerializedError,
} from "./ports/error"
