/**
 * Paging window echoed back to the caller. Values are copied as given;
 * range checks belong to the caller.
 */
export type PaginationInfo = Readonly<{
  totalCount: number
  limit: number
  offset: number
}>

export type Metadata = Readonly<{
  /** Unique per envelope. */
  requestId: string

  apiVersion: string

  /** Envelope creation time, ISO-8601 in UTC (`2024-01-15T10:30:00.000Z`). */
  timestamp: string

  /**
   * Whole milliseconds spent building the envelope inside this library.
   *
   * @remarks
   * This is library-internal construction cost, not request latency: it starts when
   * the factory is called and stops right before the envelope is frozen.
   */
  processingTimeMs: number

  /** Only present on envelopes built with pagination. */
  pagination?: PaginationInfo
}>
