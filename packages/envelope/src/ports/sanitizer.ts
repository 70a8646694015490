/**
 * Redacts credentials from free-form request descriptions such as
 * `"GET /orders?token=abc&page=2"`.
 */
export interface Sanitizer {
  sanitize(details: string): string
  sanitize(details: string | null | undefined): string | undefined
}
