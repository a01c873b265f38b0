/**
 * Source of "now" for snapshot timestamps, generated workflow ids and
 * retention cleanup. Tests pin it with MockClock.
 */

export interface Clock {
  now(): Date;
  /** Epoch milliseconds */
  timestamp(): number;
  /** ISO 8601, as written into snapshots */
  iso(): string;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return this.now().toISOString();
  }
}

/** Frozen until advanced */
export class MockClock implements Clock {
  private millis: number;

  constructor(start: Date = new Date('2025-01-01T00:00:00.000Z')) {
    this.millis = start.getTime();
  }

  now(): Date {
    return new Date(this.millis);
  }

  timestamp(): number {
    return this.millis;
  }

  iso(): string {
    return this.now().toISOString();
  }

  advance(ms: number): void {
    this.millis += ms;
  }

  setTime(time: Date): void {
    this.millis = time.getTime();
  }
}
