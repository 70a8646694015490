const FRAME_LINE = /^\s*at\s+(.+)$/

/**
 * Extract call-stack frames from a V8 `error.stack` string.
 *
 * The header (`Name: message`, possibly spanning several lines) is dropped and each
 * `    at fn (file:line:col)` line becomes `fn (file:line:col)`. Anything other than
 * a string, such as a `stack` that was reassigned, yields no frames.
 */
export function stackFrames(stack: unknown): string[] {
  if (typeof stack !== "string" || stack === "") return []

  const frames: string[] = []

  for (const line of stack.split("\n")) {
    const match = FRAME_LINE.exec(line)
    if (match?.[1]) frames.push(match[1].trim())
  }

  return frames
}
