/**
 * Clock
 *
 * All time-based transitions (delegation expiry, spending-period reset,
 * recovery and emergency delays) are evaluated lazily against a clock
 * reading taken at call time. Nothing is scheduled.
 */

import { BastionError } from "./errors.js";

/** Whole seconds since the Unix epoch. */
export type Timestamp = number;

export const MINUTE = 60;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export interface Clock {
  now(): Timestamp;
}

export class SystemClock implements Clock {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Never goes backwards.
 */
export class ManualClock implements Clock {
  private current: Timestamp;

  constructor(start: Timestamp = 0) {
    assertTimestamp(start);
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  set(timestamp: Timestamp): void {
    assertTimestamp(timestamp);
    if (timestamp < this.current) {
      throw new BastionError(
        "INVALID_CONFIG",
        `Clock cannot move backwards: ${timestamp} < ${this.current}`,
      );
    }
    this.current = timestamp;
  }

  advance(seconds: number): Timestamp {
    this.set(this.current + seconds);
    return this.current;
  }
}

function assertTimestamp(value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new BastionError("INVALID_CONFIG", `Invalid timestamp: ${value}`);
  }
}
