import { createNullLogger, type Logger } from "@shroud/logger"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** @default [new EnvSource()] */
  sources?: readonly ConfigSource[]

  logger?: Logger
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  logger = createNullLogger(),
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    logger.error("Configuration rejected", { issues: issues.map((i) => i.path) })

    throw new ConfigError(z.prettifyError(result.error), issues)
  }

  const config = new Config<T>(
    result.data,
    withDefaults(provenance, result.data),
    new Set(Object.keys(merged)),
  )

  logger.debug("Configuration loaded", { sources: config.sourcesUsed() })

  return config
}

function withDefaults(
  provenance: Record<string, string>,
  data: Record<string, unknown>,
): Record<string, string> {
  const out: Record<string, string> = {}

  for (const key of Object.keys(data)) {
    out[key] = provenance[key] ?? "default"
  }

  return out
}
