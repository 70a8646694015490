import { type ConfigSource, DotenvSource, EnvSource, type IConfig, loadConfig } from "@shroud/config"
import { uuidStrategies } from "@shroud/id"
import { type Logger, logLevelNames } from "@shroud/logger"
import { z } from "zod"
import { DEFAULT_SENSITIVE_KEYS } from "../adapters/sanitizer/pattern-sanitizer"
import { API_VERSION } from "../core/version"

export const ENV_PREFIX = "SHROUD_"

const keyList = z.union([
  z.array(z.string()),
  z.string().transform((raw) =>
    raw
      .split(",")
      .map((key) => key.trim())
      .filter((key) => key !== ""),
  ),
])

export const envelopeSettingsSchema = z.object({
  /** `"true"`, `"false"`, `"1"`, `"0"`, `"yes"`, `"no"` and friends are accepted from env. */
  DEBUG_MODE: z.union([z.boolean(), z.stringbool()]).default(false),
  API_VERSION: z.string().min(1).default(API_VERSION),
  /** Comma-separated in env: `SHROUD_SENSITIVE_KEYS=password,token,session_id`. */
  SENSITIVE_KEYS: keyList.default([...DEFAULT_SENSITIVE_KEYS]),
  REQUEST_ID: z.enum(uuidStrategies).default("uuid-v4"),
  /** Optional request-id prefix: `req` gives `req_<uuid>`. */
  REQUEST_ID_PREFIX: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type EnvelopeSettings = z.infer<typeof envelopeSettingsSchema>

export type LoadEnvelopeSettingsOptions = {
  /**
   * Only `SHROUD_*` keys are read from either default source, so a host
   * application's own `DEBUG_MODE` or `LOG_LEVEL` never reaches these settings.
   *
   * @default [SHROUD_* keys of an optional .env file, SHROUD_* environment variables]
   */
  sources?: readonly ConfigSource[]

  /** Directory holding the default `.env` file. @default process.cwd() */
  cwd?: string

  logger?: Logger
}

export function loadEnvelopeSettings(
  options: LoadEnvelopeSettingsOptions = {},
): Promise<IConfig<EnvelopeSettings>> {
  const sources = options.sources ?? [
    new DotenvSource({
      file: ".env",
      required: false,
      prefix: ENV_PREFIX,
      ...(options.cwd && { cwd: options.cwd }),
    }),
    new EnvSource({ prefix: ENV_PREFIX }),
  ]

  return loadConfig({
    schema: envelopeSettingsSchema,
    sources,
    ...(options.logger && { logger: options.logger }),
  })
}
