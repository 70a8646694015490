import { types } from "node:util"
import type { InspectedThrowable } from "../../ports/error"
import { errorChain } from "../utils/error-chain"
import { stackFrames } from "./stack-frames"
import { errorTypeName, NON_ERROR_TYPE_NAME } from "./type-name"

export type InspectOptions = Readonly<{
  /**
   * Maximum number of errors rendered from the cause chain, the thrown value included.
   * @default 10
   */
  maxCauseDepth?: number
}>

/**
 * Capture the runtime type name and call stack of a thrown value.
 *
 * @returns `undefined` for `null`/`undefined`, which mean "no exception".
 *
 * @example
 * ```ts
 * inspectThrowable(new TypeError("bad input"))
 * // {
 * //   typeName: "TypeError",
 * //   stackTrace: "parseInput (/srv/app/parse.ts:12:11)\nhandle (/srv/app/handler.ts:4:3)",
 * // }
 * ```
 */
export function inspectThrowable(
  value: unknown,
  options: InspectOptions = {},
): InspectedThrowable | undefined {
  if (value === null || value === undefined) return undefined

  if (!isError(value)) {
    return { typeName: NON_ERROR_TYPE_NAME, stackTrace: undefined }
  }

  const [, ...causes] = errorChain(value, options.maxCauseDepth ?? 10)
  const lines = stackFrames(value.stack)

  for (const cause of causes) {
    lines.push(causedByLine(cause))
    if (isError(cause)) lines.push(...stackFrames(cause.stack))
  }

  return { typeName: errorTypeName(value), stackTrace: lines.join("\n") }
}

function causedByLine(cause: unknown): string {
  if (isError(cause)) {
    return `Caused by: ${errorTypeName(cause)}: ${cause.message}`
  }

  return `Caused by: ${NON_ERROR_TYPE_NAME}: ${typeof cause === "string" ? cause : "Unknown error"}`
}

/** Also true for errors created in another realm, e.g. a `vm` context. */
function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value)
}
