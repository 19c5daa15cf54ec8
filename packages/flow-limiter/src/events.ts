// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Flow limiter event bus.
 *
 * `FlowEventEmitter` is a typed, synchronous publish-subscribe bus for the
 * limiter's lifecycle events.  It is the notification sink for limit
 * changes: audit logging, metrics and alerting subscribe here instead of
 * the limiter writing anywhere itself.
 *
 * Supported events:
 *   - flow:limit:changed — after every setLimit() call
 *   - flow:recorded      — after an outflow/inflow is committed
 *   - flow:rejected      — when a record call is refused
 *
 * Usage:
 * ```ts
 * const limiter = new FlowLimiter({ defaultLimit: 1_000 });
 *
 * limiter.events.on(EVENT_LIMIT_CHANGED, (payload) => {
 *   auditSink.write(payload.subject, payload.newLimit, payload.actor);
 * });
 * ```
 */

import type { FlowDirection } from './types.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after every setLimit() call, including no-op updates. */
export const EVENT_LIMIT_CHANGED = 'flow:limit:changed' as const;

/** Emitted after a flow has been committed to the current epoch. */
export const EVENT_FLOW_RECORDED = 'flow:recorded' as const;

/** Emitted when a flow is rejected because it would exceed the limit. */
export const EVENT_FLOW_REJECTED = 'flow:rejected' as const;

/** Union of all supported event name constants. */
export type FlowEventName =
  | typeof EVENT_LIMIT_CHANGED
  | typeof EVENT_FLOW_RECORDED
  | typeof EVENT_FLOW_REJECTED;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface LimitChangedEventPayload {
  readonly subject: string;
  readonly previousLimit: number;
  readonly newLimit: number;
  /** Identity of whoever made the (already authorized) change. */
  readonly actor: string;
  /** ISO 8601 timestamp taken from the limiter's clock. */
  readonly timestamp: string;
}

export interface FlowRecordedEventPayload {
  readonly subject: string;
  readonly direction: FlowDirection;
  readonly amount: number;
  /** Epoch counters after the commit. */
  readonly outflow: number;
  readonly inflow: number;
  readonly epoch: number;
  readonly timestamp: string;
}

export interface FlowRejectedEventPayload {
  readonly subject: string;
  readonly direction: FlowDirection;
  readonly attempted: number;
  readonly available: number;
  readonly limit: number;
  readonly epoch: number;
  readonly timestamp: string;
}

/**
 * Maps each event name to its corresponding payload interface.
 *
 * Used to drive the generic signatures on `on()`, `off()`, and `emit()`.
 */
export interface FlowEventPayloadMap {
  [EVENT_LIMIT_CHANGED]: LimitChangedEventPayload;
  [EVENT_FLOW_RECORDED]: FlowRecordedEventPayload;
  [EVENT_FLOW_REJECTED]: FlowRejectedEventPayload;
}

export type FlowEventListener<E extends FlowEventName> = (
  payload: FlowEventPayloadMap[E],
) => void;

/** Receives whatever a listener threw, and the event it was handling. */
export type ListenerErrorHandler = (error: unknown, event: FlowEventName) => void;

export interface FlowEventEmitterOptions {
  /**
   * Called once per throwing listener. Without it the error is rethrown
   * from a microtask, where it surfaces as an uncaught exception.
   */
  onListenerError?: ListenerErrorHandler;
}

const EVENT_NAMES: readonly FlowEventName[] = [
  EVENT_LIMIT_CHANGED,
  EVENT_FLOW_RECORDED,
  EVENT_FLOW_REJECTED,
];

interface Subscription<E extends FlowEventName> {
  readonly listener: FlowEventListener<E>;
  readonly once: boolean;
}

type SubscriptionTable = { [E in FlowEventName]: ReadonlyArray<Subscription<E>> };

function rethrowLater(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}

// ---------------------------------------------------------------------------
// FlowEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed publish-subscribe event emitter.
 *
 * Listener lists are copy-on-write: registering or removing replaces the
 * list, so an emit in progress keeps iterating the list it started with.
 *
 * A throwing listener does not stop the others and does not propagate out
 * of `emit()`. The limiter emits after deciding an outcome, and a
 * subscriber's failure must not undo or mask that outcome.
 */
export class FlowEventEmitter {
  readonly #table: SubscriptionTable = {
    [EVENT_LIMIT_CHANGED]: [],
    [EVENT_FLOW_RECORDED]: [],
    [EVENT_FLOW_REJECTED]: [],
  };
  readonly #onListenerError: ListenerErrorHandler;

  constructor(options: FlowEventEmitterOptions = {}) {
    this.#onListenerError = options.onListenerError ?? rethrowLater;
  }

  /** Registers a persistent listener. Returns `this` for chaining. */
  on<E extends FlowEventName>(event: E, listener: FlowEventListener<E>): this {
    this.#subscribe(event, { listener, once: false });
    return this;
  }

  /** Registers a listener that is dropped after its first invocation. */
  once<E extends FlowEventName>(event: E, listener: FlowEventListener<E>): this {
    this.#subscribe(event, { listener, once: true });
    return this;
  }

  /** Removes the earliest registration of `listener` for `event`. */
  off<E extends FlowEventName>(event: E, listener: FlowEventListener<E>): this {
    const current = this.#table[event];
    const index = current.findIndex((subscription) => subscription.listener === listener);
    if (index !== -1) {
      this.#table[event] = [...current.slice(0, index), ...current.slice(index + 1)];
    }
    return this;
  }

  /**
   * Invokes the listeners for `event` in registration order.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends FlowEventName>(event: E, payload: FlowEventPayloadMap[E]): boolean {
    const subscriptions = this.#table[event];
    if (subscriptions.length === 0) return false;

    // One-shot listeners go first so a re-entrant emit cannot fire them twice.
    if (subscriptions.some((subscription) => subscription.once)) {
      this.#table[event] = subscriptions.filter((subscription) => !subscription.once);
    }

    for (const { listener } of subscriptions) {
      try {
        listener(payload);
      } catch (error) {
        this.#onListenerError(error, event);
      }
    }
    return true;
  }

  /** Removes all listeners for `event`, or for every event when omitted. */
  removeAllListeners(event?: FlowEventName): this {
    for (const name of event !== undefined ? [event] : EVENT_NAMES) {
      this.#clear(name);
    }
    return this;
  }

  listenerCount(event: FlowEventName): number {
    return this.#table[event].length;
  }

  #subscribe<E extends FlowEventName>(event: E, subscription: Subscription<E>): void {
    this.#table[event] = [...this.#table[event], subscription];
  }

  #clear<E extends FlowEventName>(event: E): void {
    this.#table[event] = [];
  }
}
