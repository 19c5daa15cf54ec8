// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { FlowDirection } from './types.js';

/**
 * Base class for all flow limiter errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class FlowLimiterError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'FlowLimiterError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when recording a flow would push the subject's net flow for the
 * current epoch past its configured limit.
 *
 * The limiter state is untouched when this is thrown. `available` is the
 * headroom left in the same direction, so callers can retry with a smaller
 * amount, wait for the next epoch, or abort the enclosing transfer.
 */
export class FlowLimitExceededError extends FlowLimiterError {
  /** The subject whose limit would be exceeded. */
  readonly subject: string;
  /** Direction of the rejected flow. */
  readonly direction: FlowDirection;
  /** The amount the caller tried to record. */
  readonly attempted: number;
  /** Headroom remaining in `direction` for the current epoch. */
  readonly available: number;
  /** The limit in force at the time of the check. */
  readonly limit: number;

  constructor(
    subject: string,
    direction: FlowDirection,
    attempted: number,
    available: number,
    limit: number,
  ) {
    super(
      'FLOW_LIMIT_EXCEEDED',
      `Flow limit exceeded for subject "${subject}": ${direction} of ${attempted} requested, ` +
        `${available} available (limit ${limit}).`,
    );
    this.name = 'FlowLimitExceededError';
    this.subject = subject;
    this.direction = direction;
    this.attempted = attempted;
    this.available = available;
    this.limit = limit;
  }
}

/**
 * Thrown when recording a flow would carry a counter past
 * `Number.MAX_SAFE_INTEGER`, where sums stop being exact.
 *
 * Nothing is committed. The limit check cannot be trusted beyond that
 * point, so the flow is refused whatever the limit says.
 */
export class FlowCounterOverflowError extends FlowLimiterError {
  readonly subject: string;
  readonly direction: FlowDirection;
  readonly attempted: number;
  /** The `direction` counter for the current epoch, unchanged. */
  readonly counter: number;

  constructor(subject: string, direction: FlowDirection, attempted: number, counter: number) {
    super(
      'FLOW_COUNTER_OVERFLOW',
      `Flow counter overflow for subject "${subject}": ${direction} of ${attempted} on top of ` +
        `${counter} exceeds ${Number.MAX_SAFE_INTEGER}.`,
    );
    this.name = 'FlowCounterOverflowError';
    this.subject = subject;
    this.direction = direction;
    this.attempted = attempted;
    this.counter = counter;
  }
}

/**
 * Thrown when limiter configuration is structurally or semantically invalid.
 *
 * The `details` array carries one `path: message` entry per Zod issue.
 */
export class InvalidConfigError extends FlowLimiterError {
  /** Structured list of individual validation failures. */
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Flow limiter configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}
