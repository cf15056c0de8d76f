/**
 * Time source for save timestamps.
 */
export type Clock = {
  now(): Date

  /** Milliseconds since Unix epoch. */
  nowMs(): number
}
