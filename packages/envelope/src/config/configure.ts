import { type Clock, SystemClock } from "@shroud/clock"
import { type IdGenerator, prefixed, uuidGenerator } from "@shroud/id"
import { createPinoLogger, type Logger } from "@shroud/logger"
import { DebugSwitch } from "../adapters/policy/debug-switch"
import { createSanitizer } from "../adapters/sanitizer/pattern-sanitizer"
import { createEnvelopeFactory, type EnvelopeFactory } from "../core/envelope-factory"
import type { EnvelopeSettings } from "./settings"

export type ConfigureEnvelopesDeps = {
  /**
   * Switch to drive instead of a fresh one, e.g. `defaultDebugSwitch` so that
   * `setDebugMode` keeps governing the configured factory.
   */
  debugSwitch?: DebugSwitch

  /** @default pino logger at `settings.LOG_LEVEL` */
  logger?: Logger

  clock?: Clock
}

export type ConfiguredEnvelopes = EnvelopeFactory & {
  readonly debugSwitch: DebugSwitch
}

/**
 * Builds an envelope factory from loaded settings.
 *
 * @example
 * ```ts
 * const settings = await loadEnvelopeSettings()
 * const envelopes = configureEnvelopes(settings.value)
 * envelopes.failure("E400", "Invalid input")
 * ```
 */
export function configureEnvelopes(
  settings: EnvelopeSettings,
  deps: ConfigureEnvelopesDeps = {},
): ConfiguredEnvelopes {
  const logger = deps.logger ?? createPinoLogger({}, { level: settings.LOG_LEVEL })

  let debugSwitch: DebugSwitch
  if (deps.debugSwitch) {
    debugSwitch = deps.debugSwitch
    debugSwitch.set(settings.DEBUG_MODE)
  } else {
    debugSwitch = new DebugSwitch({ logger }, { enabled: settings.DEBUG_MODE })
  }

  const uuids = uuidGenerator(settings.REQUEST_ID)
  const idGenerator: IdGenerator<string> = settings.REQUEST_ID_PREFIX
    ? prefixed(settings.REQUEST_ID_PREFIX, uuids)
    : uuids

  const factory = createEnvelopeFactory({
    clock: deps.clock ?? new SystemClock(),
    idGenerator,
    policy: debugSwitch,
    sanitizer: createSanitizer({ keys: settings.SENSITIVE_KEYS }),
    apiVersion: settings.API_VERSION,
  })

  logger.info("Envelopes configured", {
    apiVersion: settings.API_VERSION,
    requestIdStrategy: settings.REQUEST_ID,
    sensitiveKeys: settings.SENSITIVE_KEYS.length,
  })

  return { ...factory, debugSwitch }
}
