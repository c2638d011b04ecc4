import type { Clock } from "../../src/crowdfunding/types.js";

export class FakeClock implements Clock {
  private nowUnix: number;

  constructor(startUnix: number) {
    this.nowUnix = startUnix;
  }

  now(): number {
    return this.nowUnix;
  }

  set(unix: number): void {
    this.nowUnix = unix;
  }

  advance(seconds: number): void {
    this.nowUnix += seconds;
  }
}
