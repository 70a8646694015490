function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/** The `cause` of a value, or `undefined` when it has none. */
export function causeOf(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the cause chain starting at `err` (inclusive).
 *
 * Stops at `maxDepth` entries or at the first value already seen.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = causeOf(current)

    if (next === undefined) break
    current = next
  }

  return chain
}
