export type TimeSource = {
  now(): Date
}
