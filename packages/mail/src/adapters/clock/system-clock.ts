import type { TimeSource } from "../../ports/clock"

export class SystemClock implements TimeSource {
  now(): Date {
    return new Date()
  }
}
