import type { IdGenerator } from "../ports/id-generator"

/**
 * Prefix every id of `inner` with `<prefix>_`, e.g. `req_0192f6d4-…`.
 */
export const prefixed = <P extends string>(
  prefix: P,
  inner: IdGenerator<string>,
): IdGenerator<`${P}_${string}`> => ({
  generate: () => `${prefix}_${inner.generate()}`,
})
