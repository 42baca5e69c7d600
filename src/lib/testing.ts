import type { Clock } from "./clock.js";

/**
 * Clock whose sleeps complete immediately while advancing virtual time.
 */
export class FakeClock implements Clock {
  public readonly sleeps: number[] = [];
  private current: number;

  constructor(start = Date.parse("2026-01-01T00:00:00.000Z")) {
    this.current = start;
  }

  now(): Date {
    return new Date(this.current);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}
