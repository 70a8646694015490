import { BaseError } from "@shroud/errors"

export type ConfigIssue = Readonly<{
  path: string
  message: string
}>

/**
 * Thrown by `loadConfig` when merged values do not satisfy the schema.
 * `context.issues` lists each failing key; values are never included.
 */
export class ConfigError extends BaseError<"config_invalid"> {
  readonly issues: readonly ConfigIssue[]

  constructor(summary: string, issues: readonly ConfigIssue[]) {
    super(`Configuration validation failed:\n${summary}`, {
      code: "config_invalid",
      context: { issues },
      isOperational: false,
    })

    this.issues = issues
  }
}
