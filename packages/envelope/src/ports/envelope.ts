import type { GatedErrorDetail } from "./error-detail"
import type { Metadata } from "./metadata"
import type { StatusCode } from "./status-code"

export type SuccessEnvelope<T> = Readonly<{
  statusCode: typeof StatusCode.Success
  data: T
  error?: undefined
  metadata: Metadata
}>

export type FailureEnvelope = Readonly<{
  statusCode: typeof StatusCode.Failure
  data?: undefined
  error: GatedErrorDetail
  metadata: Metadata
}>

export type ErrorEnvelope = Readonly<{
  statusCode: typeof StatusCode.Error
  data?: undefined
  error: GatedErrorDetail
  metadata: Metadata
}>

/**
 * The one response shape shared by every endpoint. `statusCode` tells which of
 * `data` and `error` is populated.
 */
export type ResponseEnvelope<T> = SuccessEnvelope<T> | FailureEnvelope | ErrorEnvelope
