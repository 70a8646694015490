export const StatusCode = {
  Success: "SUCCESS",
  /** Caller-declared business or validation failure, no underlying exception. */
  Failure: "FAILURE",
  /** Caller-declared failure wrapping a caught exception. */
  Error: "ERROR",
} as const

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode]
