import type { ConfigSource } from "../../ports/source"

/**
 * In-memory values, typically programmatic overrides applied last.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
