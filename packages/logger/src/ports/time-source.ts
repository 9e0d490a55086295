export type TimeSource = {
  /** Current time as a Date object. */
  now(): Date
}
