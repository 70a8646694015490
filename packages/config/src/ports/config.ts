/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     DEBUG_MODE: z.stringbool().default(false),
 *     API_VERSION: z.string().default("1.0.0"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("DEBUG_MODE")     // false
 * config.explain("DEBUG_MODE") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`
   * (e.g. `"env"`, `"dotenv:.env"`), or `"default"` for schema defaults.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined in the schema (typos, stale settings). */
  unknownKeys(): string[]
}
