import type { LogLevelName } from "./log-level"

/**
 * Logger policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans. Keep off in production, where JSON lines are ingested.
   */
  prettify?: boolean

  /**
   * Field paths whose values are replaced by the censor before output,
   * e.g. `["password", "headers.authorization"]`.
   */
  redact?: readonly string[]
}
