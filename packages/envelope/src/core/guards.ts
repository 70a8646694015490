import type {
  ErrorEnvelope,
  FailureEnvelope,
  ResponseEnvelope,
  SuccessEnvelope,
} from "../ports/envelope"
import { StatusCode } from "../ports/status-code"

export const isSuccess = <T>(envelope: ResponseEnvelope<T>): envelope is SuccessEnvelope<T> =>
  envelope.statusCode === StatusCode.Success

export const isFailure = <T>(envelope: ResponseEnvelope<T>): envelope is FailureEnvelope =>
  envelope.statusCode === StatusCode.Failure

export const isError = <T>(envelope: ResponseEnvelope<T>): envelope is ErrorEnvelope =>
  envelope.statusCode === StatusCode.Error
