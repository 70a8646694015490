import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "dotenv-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("parses key=value pairs", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "DEBUG_MODE=true\nAPI_VERSION=2.0.0\nSENSITIVE_KEYS=password,token")

    const source = new DotenvSource({ file: ".env", required: true, cwd })
    const result = await source.load()

    expect(source.name).toBe("dotenv:.env")
    expect(result).toEqual({
      DEBUG_MODE: "true",
      API_VERSION: "2.0.0",
      SENSITIVE_KEYS: "password,token",
    })
  })

  it("handles quoted values", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      `SINGLE='single quoted'\nDOUBLE="double quoted"\nUNQUOTED=no quotes`,
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })
    const result = await source.load()

    expect(result).toEqual({
      SINGLE: "single quoted",
      DOUBLE: "double quoted",
      UNQUOTED: "no quotes",
    })
  })

  it("ignores comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# masking\nDEBUG_MODE=false\n# versioning\nAPI_VERSION=1.0.0",
    )

    const source = new DotenvSource({ file: ".env", required: true, cwd })
    const result = await source.load()

    expect(result).toEqual({
      DEBUG_MODE: "false",
      API_VERSION: "1.0.0",
    })
  })

  it("returns empty object when file missing and not required", async () => {
    const source = new DotenvSource({ file: ".env", required: false, cwd })
    const result = await source.load()

    expect(result).toEqual({})
  })

  it("throws when file missing and required", async () => {
    const source = new DotenvSource({ file: ".env", required: true, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("rethrows errors other than a missing file", async () => {
    await fs.mkdir(path.join(cwd, ".env"))

    const source = new DotenvSource({ file: ".env", required: false, cwd })

    await expect(source.load()).rejects.toMatchObject({ code: "EISDIR" })
  })

  it("resolves path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, ".env"), "API_VERSION=3.0.0")

    const source = new DotenvSource({ file: ".env", required: true, cwd: subdir })
    const result = await source.load()

    expect(result).toEqual({ API_VERSION: "3.0.0" })
  })

  it("loads only prefixed keys when a prefix is set", async () => {
    await fs.writeFile(path.join(cwd, ".env"), "DEBUG_MODE=true\nSHROUD_API_VERSION=2.0.0")

    const source = new DotenvSource({ file: ".env", required: true, cwd, prefix: "SHROUD_" })
    const result = await source.load()

    expect(source.name).toBe("dotenv:.env:SHROUD_*")
    expect(result).toEqual({ API_VERSION: "2.0.0" })
  })
})
