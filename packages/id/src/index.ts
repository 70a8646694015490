export { prefixed } from "./adapters/prefixed"
export { type UuidStrategy, uuidGenerator, uuidStrategies, uuidV4, uuidV7 } from "./adapters/uuid"
export type { IdGenerator } from "./ports/id-generator"
