export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error. Never put secrets here: `context`
 * is copied verbatim into serialized output.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus programmer error or broken invariant (`false`).
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

/**
 * What can be learned about a thrown value without exposing it: the runtime
 * type name and the rendered call-stack frames, cause chain included.
 *
 * `stackTrace` is `undefined` when the thrown value carries no stack at all
 * (strings, plain objects).
 */
export type InspectedThrowable = Readonly<{
  typeName: string
  stackTrace: string | undefined
}>
