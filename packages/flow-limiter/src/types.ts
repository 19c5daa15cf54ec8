// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// ─── Direction ───────────────────────────────────────────────────────────────

export type FlowDirection = 'outflow' | 'inflow';

// ─── Subject state ───────────────────────────────────────────────────────────

/**
 * Live accounting state for one subject.
 *
 * Counters are keyed by epoch index. Only the current epoch's entries are
 * ever read; older entries are pruned on write.
 */
export interface SubjectFlowState {
  readonly subject: string;
  /** Maximum net flow per epoch. 0 disables enforcement. */
  limit: number;
  readonly outflowByEpoch: Map<number, number>;
  readonly inflowByEpoch: Map<number, number>;
  readonly createdAt: Date;
  updatedAt: Date;
}

// ─── Check result ────────────────────────────────────────────────────────────

export type FlowCheckReason = 'within_limit' | 'exceeds_limit' | 'counter_overflow' | 'unlimited';

export interface FlowCheckResult {
  readonly permitted: boolean;
  readonly subject: string;
  readonly direction: FlowDirection;
  readonly requested: number;
  /** Headroom in `direction` before this request. Infinity when unlimited. */
  readonly available: number;
  readonly limit: number;
  readonly outflow: number;
  readonly inflow: number;
  readonly epoch: number;
  readonly reason: FlowCheckReason;
}

// ─── Usage snapshot ──────────────────────────────────────────────────────────

export interface FlowUsage {
  readonly subject: string;
  readonly limit: number;
  /** False when limit is 0. */
  readonly enforced: boolean;
  readonly epoch: number;
  readonly epochStart: string;
  readonly nextEpochAt: string;
  readonly outflow: number;
  readonly inflow: number;
  /** outflow - inflow; negative when the subject is a net receiver. */
  readonly netFlow: number;
  readonly availableOutflow: number;
  readonly availableInflow: number;
}
