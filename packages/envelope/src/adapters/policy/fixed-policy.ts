import type { RevealPolicy } from "../../ports/reveal-policy"

/** Policy that never changes, e.g. one per request or per test. */
export const fixedPolicy = (enabled: boolean): RevealPolicy =>
  Object.freeze({ isDebugMode: () => enabled })

export const revealAll: RevealPolicy = fixedPolicy(true)

export const revealNone: RevealPolicy = fixedPolicy(false)
