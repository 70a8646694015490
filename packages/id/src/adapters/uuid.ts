import { randomUUID as v4 } from "node:crypto"
import { v7 } from "uuid"
import type { IdGenerator } from "../ports/id-generator"

/** Random UUIDs (RFC 9562 version 4). */
export const uuidV4: IdGenerator<string> = { generate: () => v4() }

/** Time-ordered UUIDs (RFC 9562 version 7); later ids sort after earlier ones. */
export const uuidV7: IdGenerator<string> = { generate: () => v7() }

export const uuidStrategies = ["uuid-v4", "uuid-v7"] as const

export type UuidStrategy = (typeof uuidStrategies)[number]

export function uuidGenerator(strategy: UuidStrategy): IdGenerator<string> {
  switch (strategy) {
    case "uuid-v4":
      return uuidV4
    case "uuid-v7":
      return uuidV7
  }
}
