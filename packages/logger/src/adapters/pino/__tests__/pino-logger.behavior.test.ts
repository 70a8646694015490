import { Writable } from "node:stream"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { requestId: "r-1" },
    )

    logger.info("hello", { component: "debug-switch" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0])

    expect(payload).toMatchObject({
      msg: "hello",
      requestId: "r-1",
      component: "debug-switch",
    })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { requestId: "r-1" },
    )
    const child = base.child({ component: "config" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "logged",
      requestId: "r-1",
      component: "config",
    })
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("failed", { err: new Error("outer", { cause: new Error("inner") }) })

    const err = parseLine(lines[0]).err

    expect(err).toMatchObject({ type: "Error", message: "outer" })
    expect(err).toHaveProperty("cause.message", "inner")
  })

  it("censors redacted paths", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", redact: ["password", "request.token"] },
    )

    logger.info("login", { password: "test-secret", request: { token: "test-token", user: "u-1" } })

    expect(parseLine(lines[0])).toMatchObject({
      password: "********",
      request: { token: "********", user: "u-1" },
    })
  })
})
