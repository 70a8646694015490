import { inspect } from "node:util"
import { type InspectedThrowable, inspectThrowable } from "@shroud/errors"
import { defaultDebugSwitch } from "../adapters/policy/debug-switch"
import { defaultSanitizer } from "../adapters/sanitizer/pattern-sanitizer"
import type { ErrorDetailView, GatedErrorDetail } from "../ports/error-detail"
import type { RevealPolicy } from "../ports/reveal-policy"
import type { Sanitizer } from "../ports/sanitizer"
import { ACCESS_DENIED_MESSAGE, HIDDEN_PLACEHOLDER } from "./placeholders"

export type ErrorDetailInit = {
  code: string
  message: string

  /** Any thrown value. `null` and `undefined` mean no exception. */
  exception?: unknown

  /** Free-form description of the failing request; sanitized before it is kept. */
  requestDetails?: string | null | undefined
}

export type ErrorDetailDeps = {
  /** @default defaultDebugSwitch */
  policy?: RevealPolicy

  /** @default defaultSanitizer */
  sanitizer?: Sanitizer
}

type Diagnostics = {
  captured: InspectedThrowable | undefined
  requestDetails: string | undefined
}

// Raw diagnostics live outside the instances, out of reach of spread,
// Object.keys and structuredClone.
const diagnostics = new WeakMap<ErrorDetail, Diagnostics>()

/**
 * Error payload of a FAILURE or ERROR envelope.
 *
 * `code` and `message` are always readable. Exception type, stack trace and
 * request details are captured once, at construction, and every read asks the
 * policy whether to return them or a placeholder. Nothing is cached, so turning
 * debug mode off hides diagnostics on envelopes that already exist.
 *
 * @example
 * ```ts
 * const detail = new ErrorDetail({ code: "E500", message: "Lookup failed", exception: err })
 * detail.getStackTrace() // "Access Denied: Set debug mode to true to see details."
 * ```
 */
export class ErrorDetail implements GatedErrorDetail {
  readonly code: string
  readonly message: string
  private readonly policy: RevealPolicy

  constructor(init: ErrorDetailInit, deps: ErrorDetailDeps = {}) {
    const sanitizer = deps.sanitizer ?? defaultSanitizer

    this.code = init.code
    this.message = init.message
    this.policy = deps.policy ?? defaultDebugSwitch

    diagnostics.set(this, {
      captured: inspectThrowable(init.exception),
      requestDetails: sanitizer.sanitize(init.requestDetails),
    })

    Object.freeze(this)
  }

  getCode(): string {
    return this.code
  }

  getMessage(): string {
    return this.message
  }

  getExceptionType(): string | undefined {
    if (!this.policy.isDebugMode()) return HIDDEN_PLACEHOLDER

    return this.diagnostics().captured?.typeName
  }

  getStackTrace(): string | undefined {
    if (!this.policy.isDebugMode()) return ACCESS_DENIED_MESSAGE

    return this.diagnostics().captured?.stackTrace
  }

  getRequestDetails(): string | undefined {
    if (!this.policy.isDebugMode()) return HIDDEN_PLACEHOLDER

    return this.diagnostics().requestDetails
  }

  get exceptionType(): string | undefined {
    return this.getExceptionType()
  }

  get stackTrace(): string | undefined {
    return this.getStackTrace()
  }

  get requestDetails(): string | undefined {
    return this.getRequestDetails()
  }

  /** Gated view, evaluated against the policy at call time. */
  toJSON(): ErrorDetailView {
    return {
      code: this.code,
      message: this.message,
      exceptionType: this.getExceptionType(),
      stackTrace: this.getStackTrace(),
      requestDetails: this.getRequestDetails(),
    }
  }

  [inspect.custom](): ErrorDetailView {
    return this.toJSON()
  }

  private diagnostics(): Diagnostics {
    return diagnostics.get(this) ?? { captured: undefined, requestDetails: undefined }
  }
}
