import type { Clock } from "../../ports/clock"

/** Manually driven time, for deterministic save timestamps in tests. */
export class FakeClock implements Clock {
  private time: number

  constructor(start: number | Date = 0) {
    this.time = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): number {
    return this.time
  }

  advance(ms: number): void {
    this.time += ms
  }

  set(time: number | Date): void {
    this.time = typeof time === "number" ? time : time.getTime()
  }
}
