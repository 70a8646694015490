/** A duration or an instant, in milliseconds. */
export type Milliseconds = number
