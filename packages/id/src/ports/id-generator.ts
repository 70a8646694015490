export interface IdGenerator<T = string> {
  /** Returns a new identifier; values must not repeat within a process. */
  generate(): T
}
