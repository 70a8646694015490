/**
 * Error diagnostics as a reader may see them, after gating. Undefined fields
 * disappear from JSON output.
 */
export type ErrorDetailView = Readonly<{
  code: string
  message: string
  exceptionType: string | undefined
  stackTrace: string | undefined
  requestDetails: string | undefined
}>

/**
 * Read surface of an error envelope's `error` field.
 */
export interface GatedErrorDetail {
  readonly code: string
  readonly message: string

  /** Same gate as the matching getter. */
  readonly exceptionType: string | undefined
  readonly stackTrace: string | undefined
  readonly requestDetails: string | undefined

  getCode(): string
  getMessage(): string

  /** Runtime type name when debug mode is on, `"Hidden"` otherwise. */
  getExceptionType(): string | undefined

  /** Rendered frames when debug mode is on, an access-denied notice otherwise. */
  getStackTrace(): string | undefined

  /** Sanitized request details when debug mode is on, `"Hidden"` otherwise. */
  getRequestDetails(): string | undefined

  toJSON(): ErrorDetailView
}
