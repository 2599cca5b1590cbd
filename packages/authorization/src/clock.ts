/**
 * @presign/authorization — Clocks.
 */

import type { Clock } from "./types.js";

/**
 * Wall-clock time, truncated to whole seconds.
 */
export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * A clock that only moves when told to. Used by tests and the demo.
 */
export class ManualClock implements Clock {
  private _seconds: bigint;

  constructor(seconds: bigint) {
    this._seconds = seconds;
  }

  now(): bigint {
    return this._seconds;
  }

  set(seconds: bigint): void {
    this._seconds = seconds;
  }

  advance(seconds: bigint): void {
    this._seconds += seconds;
  }
}

/**
 * ISO 8601 rendering of a unix-seconds instant.
 */
export function toIsoTimestamp(seconds: bigint): string {
  return new Date(Number(seconds) * 1000).toISOString();
}
