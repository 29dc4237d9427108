import type { TimeSource } from "../../ports/clock"

export class FakeClock implements TimeSource {
  private time: number

  constructor(start: Date | string = "2026-01-02T03:04:05.000Z") {
    this.time = new Date(start).getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  advance(ms: number): void {
    this.time += ms
  }
}
