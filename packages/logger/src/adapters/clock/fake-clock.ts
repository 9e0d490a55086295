import type { TimeSource } from "../../ports/time-source"

export class FakeClock implements TimeSource {
  private time: number

  constructor(start: Date | number = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  advance(ms: number): void {
    this.time = this.time + ms
  }

  set(time: Date | number): void {
    this.time = time instanceof Date ? time.getTime() : time
  }
}
