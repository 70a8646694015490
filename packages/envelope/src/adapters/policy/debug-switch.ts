import { createNullLogger, type Logger } from "@shroud/logger"
import type { RevealPolicy } from "../../ports/reveal-policy"

export type DebugSwitchDeps = {
  logger?: Logger
}

export type DebugSwitchOptions = {
  /** @default false */
  enabled?: boolean
}

/**
 * Mutable reveal policy. The latest write wins and is seen by every
 * `ErrorDetail` holding this switch, including ones built before the write.
 */
export class DebugSwitch implements RevealPolicy {
  private enabled: boolean
  private readonly logger: Logger

  constructor(deps: DebugSwitchDeps = {}, opts: DebugSwitchOptions = {}) {
    this.logger = deps.logger ?? createNullLogger()
    this.enabled = opts.enabled ?? false

    if (this.enabled) this.announce()
  }

  isDebugMode(): boolean {
    return this.enabled
  }

  set(enabled: boolean): void {
    if (enabled === this.enabled) return

    this.enabled = enabled
    this.announce()
  }

  enable(): void {
    this.set(true)
  }

  disable(): void {
    this.set(false)
  }

  private announce(): void {
    if (this.enabled) {
      this.logger.warn("Debug mode enabled: error envelopes now expose diagnostics", {
        debugMode: true,
      })
    } else {
      this.logger.info("Debug mode disabled: error diagnostics hidden", { debugMode: false })
    }
  }
}

/** Process-wide switch behind `setDebugMode`, `isDebugMode` and the module-level factories. */
export const defaultDebugSwitch = new DebugSwitch()

export const setDebugMode = (enabled: boolean): void => defaultDebugSwitch.set(enabled)

export const isDebugMode = (): boolean => defaultDebugSwitch.isDebugMode()
