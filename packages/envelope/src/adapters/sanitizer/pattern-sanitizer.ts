import type { Sanitizer } from "../../ports/sanitizer"

export const DEFAULT_SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "apiKey",
  "auth",
  "credential",
  "card_no",
] as const

export const DEFAULT_MASK = "********"

export type PatternSanitizerOptions = {
  /**
   * Key names whose values are masked, compared case-insensitively.
   * @default DEFAULT_SENSITIVE_KEYS
   */
  keys?: readonly string[]

  /** @default DEFAULT_MASK */
  mask?: string
}

/**
 * Masks the value of every `key=value` pair whose key is listed, keeping the
 * key as written: `"Token=abc&page=2"` becomes `"Token=********&page=2"`.
 *
 * A key only matches when no letter, digit or underscore comes right before it,
 * so `oauth_token=abc` is left alone while `{token=abc}` and `"auth=abc"` are
 * masked. The value runs up to the next `&`, `,` or whitespace.
 */
export class PatternSanitizer implements Sanitizer {
  private readonly pattern: RegExp | undefined
  private readonly mask: string

  constructor(options: PatternSanitizerOptions = {}) {
    const keys = (options.keys ?? DEFAULT_SENSITIVE_KEYS).filter((key) => key.trim() !== "")

    this.mask = options.mask ?? DEFAULT_MASK
    this.pattern =
      keys.length > 0
        ? new RegExp(`(?<![A-Za-z0-9_])(${keys.map(escapeRegExp).join("|")})=[^&\\s,]*`, "gi")
        : undefined
  }

  sanitize(details: string): string
  sanitize(details: string | null | undefined): string | undefined
  sanitize(details: string | null | undefined): string | undefined {
    if (details === null || details === undefined) return undefined
    if (!this.pattern) return details

    return details.replace(this.pattern, (_match, key: string) => `${key}=${this.mask}`)
  }
}

export const createSanitizer = (options: PatternSanitizerOptions = {}): Sanitizer =>
  new PatternSanitizer(options)

export const defaultSanitizer: Sanitizer = new PatternSanitizer()

/** Shorthand for `defaultSanitizer.sanitize`. */
export function sanitizeRequestDetails(details: string): string
export function sanitizeRequestDetails(details: string | null | undefined): string | undefined
export function sanitizeRequestDetails(details: string | null | undefined): string | undefined {
  return defaultSanitizer.sanitize(details)
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}
