// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Time source for epoch derivation. Returns milliseconds since the Unix epoch.
 */
export interface Clock {
  now(): number;
}

/** Wall-clock time via `Date.now()`. */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * A clock that only moves when told to.
 *
 * Used by tests and simulations to step across epoch boundaries
 * deterministically.
 */
export class ManualClock implements Clock {
  #nowMs: number;

  constructor(startMs = 0) {
    this.#nowMs = startMs;
  }

  now(): number {
    return this.#nowMs;
  }

  /** Jump to an absolute time. */
  set(ms: number): void {
    this.#nowMs = ms;
  }

  /** Move forward by `ms`. Negative values are rejected; time never rewinds. */
  advance(ms: number): void {
    if (ms < 0) {
      throw new RangeError(`ManualClock cannot advance by a negative amount (${ms}).`);
    }
    this.#nowMs += ms;
  }
}
