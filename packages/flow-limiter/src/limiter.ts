// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { parseFlowLimiterConfig } from './config.js';
import type { FlowLimiterConfig, FlowLimiterConfigInput } from './config.js';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';
import { epochIndex, oldestRetainedEpoch } from './epoch.js';
import { FlowCounterOverflowError, FlowLimitExceededError } from './errors.js';
import {
  EVENT_FLOW_RECORDED,
  EVENT_FLOW_REJECTED,
  EVENT_LIMIT_CHANGED,
  FlowEventEmitter,
} from './events.js';
import type { FlowEventListener, ListenerErrorHandler } from './events.js';
import { FlowAuditLog } from './audit.js';
import {
  availableFlow,
  buildUsage,
  commitFlow,
  createSubjectState,
  evaluateFlow,
  flowAt,
  pruneEpochs,
} from './state.js';
import type { FlowCheckResult, FlowDirection, FlowUsage, SubjectFlowState } from './types.js';

/** Non-serialisable collaborators passed beside the config. */
export interface FlowLimiterOptions {
  /** Time source for epoch derivation. Defaults to wall-clock time. */
  clock?: Clock;
  /** Subscribed to `flow:limit:changed` on construction. */
  onLimitChanged?: FlowEventListener<typeof EVENT_LIMIT_CHANGED>;
  /**
   * Receives errors thrown by event listeners. They never change the
   * outcome of the call that emitted the event.
   */
  onListenerError?: ListenerErrorHandler;
}

/**
 * FlowLimiter — per-subject net flow cap over fixed, time-aligned epochs.
 *
 * Design contract:
 *  - The cap is on NET flow. Recording an outflow of `amount` is admitted
 *    when `outflow + amount <= inflow + limit` for the current epoch, and
 *    symmetrically for inflow. Inflow earns back outflow headroom.
 *  - Epoch index is `floor(now / epochLengthMs)`. Crossing a boundary simply
 *    addresses new, empty counters; unused headroom is not carried over.
 *  - A limit of 0 disables enforcement. Record calls succeed without
 *    touching counters.
 *  - Rejections throw FlowLimitExceededError (or FlowCounterOverflowError
 *    when a counter would pass Number.MAX_SAFE_INTEGER) and leave state
 *    untouched.
 *  - Listener errors go to `onListenerError`; an admitted flow stays
 *    committed and a rejection still throws its own error.
 *  - Authorization is the caller's job. `setLimit()` trusts its caller and
 *    only reports who made the change through the event bus.
 *
 * Every operation is synchronous and never yields between reading and
 * writing counters, so concurrent callers on the same subject are
 * serialized by the event loop.
 */
export class FlowLimiter {
  readonly events: FlowEventEmitter;
  readonly audit: FlowAuditLog;

  readonly #config: FlowLimiterConfig;
  readonly #clock: Clock;
  readonly #subjects = new Map<string, SubjectFlowState>();

  constructor(config: FlowLimiterConfigInput = {}, options: FlowLimiterOptions = {}) {
    this.#config = parseFlowLimiterConfig(config);
    this.#clock = options.clock ?? systemClock;
    this.events = new FlowEventEmitter({ onListenerError: options.onListenerError });

    this.audit = new FlowAuditLog(this.#config.audit ?? {});
    this.audit.attach(this.events);

    if (options.onLimitChanged !== undefined) {
      this.events.on(EVENT_LIMIT_CHANGED, options.onLimitChanged);
    }

    for (const preset of this.#config.subjects ?? []) {
      this.registerSubject(preset.subject, preset.limit);
    }
  }

  get epochLengthMs(): number {
    return this.#config.epochLengthMs;
  }

  /** Index of the epoch containing the clock's current time. */
  currentEpoch(): number {
    return epochIndex(this.#clock.now(), this.#config.epochLengthMs);
  }

  // ─── Subject registry ─────────────────────────────────────────────────────

  /**
   * Register a subject with an explicit limit, or the configured default.
   * Throws a RangeError if the subject is already registered; use
   * `setLimit()` to change an existing subject's limit.
   */
  registerSubject(subject: string, limit: number = this.#config.defaultLimit): FlowUsage {
    assertSubject(subject);
    assertLimit(limit);
    if (this.#subjects.has(subject)) {
      throw new RangeError(`Subject "${subject}" is already registered.`);
    }
    const state = createSubjectState(subject, limit, this.#now());
    this.#subjects.set(subject, state);
    return buildUsage(state, this.#clock.now(), this.#config.epochLengthMs);
  }

  hasSubject(subject: string): boolean {
    return this.#subjects.has(subject);
  }

  /** Drop all state for `subject`. Returns false if it was not registered. */
  removeSubject(subject: string): boolean {
    return this.#subjects.delete(subject);
  }

  listSubjects(): readonly string[] {
    return Array.from(this.#subjects.keys());
  }

  // ─── Limit ────────────────────────────────────────────────────────────────

  /**
   * Replace the subject's limit, effective for every subsequent check.
   *
   * Flow already recorded in the current epoch is not re-validated: lowering
   * the limit below the current net flow only blocks further flow in that
   * direction. Emits `flow:limit:changed` with the supplied `actor`.
   */
  setLimit(subject: string, newLimit: number, actor = 'unknown'): void {
    assertSubject(subject);
    assertLimit(newLimit);

    const state = this.#stateFor(subject);
    const previousLimit = state.limit;
    state.limit = newLimit;
    state.updatedAt = this.#now();

    this.events.emit(EVENT_LIMIT_CHANGED, {
      subject,
      previousLimit,
      newLimit,
      actor,
      timestamp: state.updatedAt.toISOString(),
    });
  }

  currentLimit(subject: string): number {
    return this.#subjects.get(subject)?.limit ?? this.#config.defaultLimit;
  }

  // ─── Record ───────────────────────────────────────────────────────────────

  /**
   * Record an outflow of `amount` against the current epoch.
   *
   * Call this before the transfer's effects become visible, and abort the
   * transfer if it throws.
   *
   * @throws FlowLimitExceededError when `outflow + amount > inflow + limit`.
   */
  recordOutflow(subject: string, amount: number): void {
    this.#record(subject, 'outflow', amount);
  }

  /**
   * Record an inflow of `amount` against the current epoch.
   *
   * @throws FlowLimitExceededError when `inflow + amount > outflow + limit`.
   */
  recordInflow(subject: string, amount: number): void {
    this.#record(subject, 'inflow', amount);
  }

  // ─── Check ────────────────────────────────────────────────────────────────

  /**
   * Preview whether an outflow would be admitted right now.
   *
   * Purely read-only: no counters move, no events fire, and unknown
   * subjects are evaluated against the default limit without being
   * registered.
   */
  checkOutflow(subject: string, amount: number): FlowCheckResult {
    return this.#check(subject, 'outflow', amount);
  }

  /** Read-only counterpart of `recordInflow()`. */
  checkInflow(subject: string, amount: number): FlowCheckResult {
    return this.#check(subject, 'inflow', amount);
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  currentOutflow(subject: string): number {
    return this.#currentFlow(subject, 'outflow');
  }

  currentInflow(subject: string): number {
    return this.#currentFlow(subject, 'inflow');
  }

  /** Outflow headroom for the current epoch. Infinity when unlimited. */
  availableOutflow(subject: string): number {
    return availableFlow(this.#peek(subject), 'outflow', this.currentEpoch());
  }

  /** Inflow headroom for the current epoch. Infinity when unlimited. */
  availableInflow(subject: string): number {
    return availableFlow(this.#peek(subject), 'inflow', this.currentEpoch());
  }

  usage(subject: string): FlowUsage {
    return buildUsage(this.#peek(subject), this.#clock.now(), this.#config.epochLengthMs);
  }

  /**
   * Usage of every registered subject, most exposed (largest absolute net
   * flow) first.
   */
  listUsage(): readonly FlowUsage[] {
    const nowMs = this.#clock.now();
    return Array.from(this.#subjects.values())
      .map((state) => buildUsage(state, nowMs, this.#config.epochLengthMs))
      .sort((a, b) => Math.abs(b.netFlow) - Math.abs(a.netFlow));
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  #record(subject: string, direction: FlowDirection, amount: number): void {
    assertSubject(subject);
    assertAmount(amount);

    const state = this.#stateFor(subject);
    if (state.limit === 0) return;

    const now = this.#now();
    const epoch = epochIndex(now.getTime(), this.#config.epochLengthMs);
    const result = evaluateFlow(state, direction, amount, epoch);

    if (!result.permitted) {
      this.events.emit(EVENT_FLOW_REJECTED, {
        subject,
        direction,
        attempted: amount,
        available: result.available,
        limit: state.limit,
        epoch,
        timestamp: now.toISOString(),
      });
      if (result.reason === 'counter_overflow') {
        throw new FlowCounterOverflowError(
          subject,
          direction,
          amount,
          direction === 'outflow' ? result.outflow : result.inflow,
        );
      }
      throw new FlowLimitExceededError(subject, direction, amount, result.available, state.limit);
    }

    commitFlow(state, direction, amount, epoch, now);
    pruneEpochs(state, oldestRetainedEpoch(epoch, this.#config.retainEpochs));

    this.events.emit(EVENT_FLOW_RECORDED, {
      subject,
      direction,
      amount,
      outflow: flowAt(state, 'outflow', epoch),
      inflow: flowAt(state, 'inflow', epoch),
      epoch,
      timestamp: now.toISOString(),
    });
  }

  #check(subject: string, direction: FlowDirection, amount: number): FlowCheckResult {
    assertSubject(subject);
    assertAmount(amount);
    return evaluateFlow(this.#peek(subject), direction, amount, this.currentEpoch());
  }

  #currentFlow(subject: string, direction: FlowDirection): number {
    const state = this.#subjects.get(subject);
    if (state === undefined) return 0;
    return flowAt(state, direction, this.currentEpoch());
  }

  /** Registered state, auto-registering with the default limit. */
  #stateFor(subject: string): SubjectFlowState {
    const existing = this.#subjects.get(subject);
    if (existing !== undefined) return existing;
    const state = createSubjectState(subject, this.#config.defaultLimit, this.#now());
    this.#subjects.set(subject, state);
    return state;
  }

  /** Registered state, or a detached empty one for unknown subjects. */
  #peek(subject: string): SubjectFlowState {
    return (
      this.#subjects.get(subject) ??
      createSubjectState(subject, this.#config.defaultLimit, this.#now())
    );
  }

  #now(): Date {
    return new Date(this.#clock.now());
  }
}

// ─── Argument guards ─────────────────────────────────────────────────────────

function assertSubject(subject: string): void {
  if (subject.length === 0) {
    throw new RangeError('Subject identifier must be a non-empty string.');
  }
}

function assertAmount(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new RangeError(`Flow amount must be a positive safe integer, got ${amount}.`);
  }
}

function assertLimit(limit: number): void {
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new RangeError(`Flow limit must be a non-negative safe integer, got ${limit}.`);
  }
}
