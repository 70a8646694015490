/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in `loadConfig`,
 * where later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env", "dotenv:.env.defaults" */
  readonly name: string

  /**
   * Load configuration values. A key mapped to `undefined` counts as "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
