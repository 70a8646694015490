import { type Clock, startStopwatch, SystemClock } from "@shroud/clock"
import { type IdGenerator, uuidV4 } from "@shroud/id"
import { defaultDebugSwitch } from "../adapters/policy/debug-switch"
import { defaultSanitizer } from "../adapters/sanitizer/pattern-sanitizer"
import type { ErrorEnvelope, FailureEnvelope, SuccessEnvelope } from "../ports/envelope"
import type { Metadata, PaginationInfo } from "../ports/metadata"
import type { RevealPolicy } from "../ports/reveal-policy"
import type { Sanitizer } from "../ports/sanitizer"
import { StatusCode } from "../ports/status-code"
import { ErrorDetail } from "./error-detail"
import { API_VERSION } from "./version"

export type EnvelopeFactoryDeps = {
  /** @default new SystemClock() */
  clock?: Clock

  /** @default uuidV4 */
  idGenerator?: IdGenerator<string>

  /** @default defaultDebugSwitch */
  policy?: RevealPolicy

  /** @default defaultSanitizer */
  sanitizer?: Sanitizer

  /** @default API_VERSION */
  apiVersion?: string
}

export interface EnvelopeFactory {
  success<T>(data: T): SuccessEnvelope<T>
  success<T>(data: T, totalCount: number, limit: number, offset: number): SuccessEnvelope<T>

  paginated<T>(data: T, pagination: PaginationInfo): SuccessEnvelope<T>

  /** Business or validation failure; no exception, no request details. */
  failure(code: string, message: string): FailureEnvelope

  /**
   * Failure caused by a caught exception. Diagnostics are captured now and
   * gated by the policy whenever they are read.
   */
  error(
    code: string,
    message: string,
    exception?: unknown,
    requestDetails?: string | null,
  ): ErrorEnvelope
}

/**
 * Binds the envelope operations to a clock, id generator, policy, sanitizer and
 * API version. None of the operations throw.
 *
 * @example
 * ```ts
 * const envelopes = createEnvelopeFactory({ policy: fixedPolicy(true) })
 * envelopes.error("E500", "Lookup failed", err, "GET /orders?token=abc")
 * ```
 */
export function createEnvelopeFactory(deps: EnvelopeFactoryDeps = {}): EnvelopeFactory {
  const clock = deps.clock ?? new SystemClock()
  const idGenerator = deps.idGenerator ?? uuidV4
  const policy = deps.policy ?? defaultDebugSwitch
  const sanitizer = deps.sanitizer ?? defaultSanitizer
  const apiVersion = deps.apiVersion ?? API_VERSION

  function build<E extends { statusCode: StatusCode }>(
    body: (metadata: () => Metadata) => E,
    pagination?: PaginationInfo,
  ): Readonly<E> {
    const timestamp = clock.now().toISOString()
    const stopwatch = startStopwatch(clock)
    const requestId = idGenerator.generate()

    return Object.freeze(
      body(() =>
        Object.freeze({
          requestId,
          apiVersion,
          timestamp,
          processingTimeMs: stopwatch.elapsedMs(),
          ...(pagination && { pagination: Object.freeze({ ...pagination }) }),
        }),
      ),
    )
  }

  function success<T>(data: T): SuccessEnvelope<T>
  function success<T>(data: T, totalCount: number, limit: number, offset: number): SuccessEnvelope<T>
  function success<T>(
    data: T,
    totalCount?: number,
    limit?: number,
    offset?: number,
  ): SuccessEnvelope<T> {
    if (totalCount === undefined || limit === undefined || offset === undefined) {
      return build((metadata) => ({ statusCode: StatusCode.Success, data, metadata: metadata() }))
    }

    return paginated(data, { totalCount, limit, offset })
  }

  function paginated<T>(data: T, pagination: PaginationInfo): SuccessEnvelope<T> {
    return build(
      (metadata) => ({ statusCode: StatusCode.Success, data, metadata: metadata() }),
      pagination,
    )
  }

  function failure(code: string, message: string): FailureEnvelope {
    return build((metadata) => {
      const error = new ErrorDetail({ code, message }, { policy, sanitizer })

      return { statusCode: StatusCode.Failure, error, metadata: metadata() }
    })
  }

  function error(
    code: string,
    message: string,
    exception?: unknown,
    requestDetails?: string | null,
  ): ErrorEnvelope {
    return build((metadata) => {
      const detail = new ErrorDetail(
        { code, message, exception, requestDetails },
        { policy, sanitizer },
      )

      return { statusCode: StatusCode.Error, error: detail, metadata: metadata() }
    })
  }

  return { success, paginated, failure, error }
}
