import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { stripPrefix } from "../../core/utils/strip-prefix"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  file: string

  /**
   * `true`: a missing file is an error. `false`: a missing file loads nothing.
   */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /**
   * Only keys starting with this prefix are loaded, with the prefix stripped,
   * as in `EnvSource`.
   */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = opts.prefix ? `dotenv:${opts.file}:${opts.prefix}*` : `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    try {
      return stripPrefix(parse(await fs.readFile(filePath, "utf-8")), this.opts.prefix)
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}

      throw err
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
