import { stackFrames } from "../stack-frames"

describe("stackFrames", () => {
  it("drops the header and the leading `at`", () => {
    const stack = [
      "TypeError: cannot read properties of undefined",
      "    at parseInput (/srv/app/parse.ts:12:11)",
      "    at Object.handle (/srv/app/handler.ts:4:3)",
      "    at node:internal/process/task_queues:95:5",
    ].join("\n")

    expect(stackFrames(stack)).toEqual([
      "parseInput (/srv/app/parse.ts:12:11)",
      "Object.handle (/srv/app/handler.ts:4:3)",
      "node:internal/process/task_queues:95:5",
    ])
  })

  it("skips a multi-line message in the header", () => {
    const stack = ["Error: first line", "second line", "    at run (/srv/a.ts:1:1)"].join("\n")

    expect(stackFrames(stack)).toEqual(["run (/srv/a.ts:1:1)"])
  })

  it("returns no frames for a missing or empty stack", () => {
    expect(stackFrames(undefined)).toEqual([])
    expect(stackFrames("")).toEqual([])
    expect(stackFrames("Error: no frames")).toEqual([])
  })

  it("returns no frames for a stack that is not a string", () => {
    expect(stackFrames(42)).toEqual([])
    expect(stackFrames({ frames: [] })).toEqual([])
  })
})
