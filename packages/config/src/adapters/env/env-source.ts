import { stripPrefix } from "../../core/utils/strip-prefix"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only keys starting with this prefix are loaded, with the prefix stripped:
   * `SHROUD_DEBUG_MODE` becomes `DEBUG_MODE`.
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}*` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.env, this.prefix)
  }
}
