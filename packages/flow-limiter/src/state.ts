// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { FlowCheckResult, FlowDirection, FlowUsage, SubjectFlowState } from './types.js';
import { epochIndex, epochStartMs, nextEpochAtMs } from './epoch.js';

/**
 * Build a fresh subject state. Counters start empty (implicit zero).
 */
export function createSubjectState(subject: string, limit: number, now: Date = new Date()): SubjectFlowState {
  return {
    subject,
    limit,
    outflowByEpoch: new Map<number, number>(),
    inflowByEpoch: new Map<number, number>(),
    createdAt: now,
    updatedAt: now,
  };
}

function countersFor(
  state: SubjectFlowState,
  direction: FlowDirection,
): { same: Map<number, number>; opposite: Map<number, number> } {
  return direction === 'outflow'
    ? { same: state.outflowByEpoch, opposite: state.inflowByEpoch }
    : { same: state.inflowByEpoch, opposite: state.outflowByEpoch };
}

/** Accumulated flow in `direction` for `epoch`; 0 when nothing was recorded. */
export function flowAt(state: SubjectFlowState, direction: FlowDirection, epoch: number): number {
  return countersFor(state, direction).same.get(epoch) ?? 0;
}

/**
 * Remaining headroom in `direction` for `epoch`: the largest amount that
 * keeps net flow within the limit and the counter within
 * `Number.MAX_SAFE_INTEGER`. Infinity when the limit is 0.
 */
export function availableFlow(state: SubjectFlowState, direction: FlowDirection, epoch: number): number {
  if (state.limit === 0) return Infinity;
  const { same, opposite } = countersFor(state, direction);
  const sameFlow = same.get(epoch) ?? 0;
  // Both counters are safe integers, so their difference is exact.
  const net = sameFlow - (opposite.get(epoch) ?? 0);
  return Math.max(0, Math.min(state.limit - net, Number.MAX_SAFE_INTEGER - sameFlow));
}

/**
 * Evaluate whether `amount` more flow in `direction` keeps the net flow
 * within the limit: `same + amount <= opposite + limit`.
 *
 * A flow that would carry the counter past `Number.MAX_SAFE_INTEGER` is
 * refused with reason `counter_overflow`, since the sum could no longer be
 * stored exactly. Pure: never mutates `state`.
 */
export function evaluateFlow(
  state: SubjectFlowState,
  direction: FlowDirection,
  amount: number,
  epoch: number,
): FlowCheckResult {
  const outflow = flowAt(state, 'outflow', epoch);
  const inflow = flowAt(state, 'inflow', epoch);
  const base = {
    subject: state.subject,
    direction,
    requested: amount,
    limit: state.limit,
    outflow,
    inflow,
    epoch,
  };

  if (state.limit === 0) {
    return { ...base, permitted: true, available: Infinity, reason: 'unlimited' };
  }

  const same = direction === 'outflow' ? outflow : inflow;
  const opposite = direction === 'outflow' ? inflow : outflow;
  const available = availableFlow(state, direction, epoch);

  if (amount > Number.MAX_SAFE_INTEGER - same) {
    return { ...base, permitted: false, available, reason: 'counter_overflow' };
  }

  // same + amount is now a safe integer, so the subtraction is exact.
  const permitted = same + amount - opposite <= state.limit;

  return {
    ...base,
    permitted,
    available,
    reason: permitted ? 'within_limit' : 'exceeds_limit',
  };
}

/**
 * Add `amount` to the `direction` counter for `epoch`.
 * Mutates `state` in place; callers must have evaluated the flow first.
 */
export function commitFlow(
  state: SubjectFlowState,
  direction: FlowDirection,
  amount: number,
  epoch: number,
  now: Date = new Date(),
): number {
  const { same } = countersFor(state, direction);
  const next = (same.get(epoch) ?? 0) + amount;
  same.set(epoch, next);
  state.updatedAt = now;
  return next;
}

/**
 * Delete counter entries for epochs before `oldestEpoch`.
 * Returns the number of entries removed across both directions.
 */
export function pruneEpochs(state: SubjectFlowState, oldestEpoch: number): number {
  let removed = 0;
  for (const counters of [state.outflowByEpoch, state.inflowByEpoch]) {
    for (const epoch of counters.keys()) {
      if (epoch < oldestEpoch) {
        counters.delete(epoch);
        removed += 1;
      }
    }
  }
  return removed;
}

/**
 * Derive a point-in-time usage snapshot for the epoch containing `nowMs`.
 */
export function buildUsage(state: SubjectFlowState, nowMs: number, epochLengthMs: number): FlowUsage {
  const epoch = epochIndex(nowMs, epochLengthMs);
  const outflow = flowAt(state, 'outflow', epoch);
  const inflow = flowAt(state, 'inflow', epoch);

  return {
    subject: state.subject,
    limit: state.limit,
    enforced: state.limit !== 0,
    epoch,
    epochStart: new Date(epochStartMs(epoch, epochLengthMs)).toISOString(),
    nextEpochAt: new Date(nextEpochAtMs(nowMs, epochLengthMs)).toISOString(),
    outflow,
    inflow,
    netFlow: outflow - inflow,
    availableOutflow: availableFlow(state, 'outflow', epoch),
    availableInflow: availableFlow(state, 'inflow', epoch),
  };
}
