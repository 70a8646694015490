import { createEnvelopeFactory } from "./envelope-factory"

/**
 * Module-level operations: system clock, random UUIDs, the default sanitizer and
 * `defaultDebugSwitch`, so `setDebugMode` governs every envelope they build.
 */
export const { success, paginated, failure, error } = createEnvelopeFactory()
