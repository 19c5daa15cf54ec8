// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import type { AuditConfig } from './config.js';
import { parseAuditConfig } from './config.js';
import {
  EVENT_FLOW_RECORDED,
  EVENT_FLOW_REJECTED,
  EVENT_LIMIT_CHANGED,
} from './events.js';
import type {
  FlowEventEmitter,
  FlowRecordedEventPayload,
  FlowRejectedEventPayload,
  LimitChangedEventPayload,
} from './events.js';

export type FlowAuditKind = 'limit_changed' | 'flow_recorded' | 'flow_rejected';

/**
 * A single immutable audit entry. Records are append-only.
 */
export interface FlowAuditRecord {
  readonly id: string;
  readonly kind: FlowAuditKind;
  readonly subject: string;
  /** Present on `limit_changed` records only. */
  readonly actor?: string;
  /** Timestamp carried by the originating event. */
  readonly timestamp: string;
  readonly details: Readonly<Record<string, string | number>>;
}

/**
 * Filter criteria for FlowAuditLog.query(). All fields are optional and
 * combined with AND semantics.
 */
export interface FlowAuditFilter {
  subject?: string;
  kind?: FlowAuditKind;
  actor?: string;
  /** Inclusive lower bound (ISO 8601 or Date). */
  since?: string | Date;
  /** Inclusive upper bound (ISO 8601 or Date). */
  until?: string | Date;
}

/**
 * FlowAuditLog keeps an in-memory, append-only trail of limit changes and
 * flow decisions, fed from a FlowEventEmitter.
 *
 * When `enabled` is false, log() is a no-op and query() always returns an
 * empty array.  When `maxRecords` is reached the oldest record is evicted.
 */
export class FlowAuditLog {
  readonly #config: AuditConfig;
  readonly #records: FlowAuditRecord[] = [];

  constructor(config: unknown = {}) {
    this.#config = parseAuditConfig(config);
  }

  /**
   * Subscribe to every limiter event on `emitter`.
   *
   * @returns A function that removes the subscriptions again.
   */
  attach(emitter: FlowEventEmitter): () => void {
    const onLimitChanged = (payload: LimitChangedEventPayload): void => {
      this.log({
        kind: 'limit_changed',
        subject: payload.subject,
        actor: payload.actor,
        timestamp: payload.timestamp,
        details: { previousLimit: payload.previousLimit, newLimit: payload.newLimit },
      });
    };
    const onRecorded = (payload: FlowRecordedEventPayload): void => {
      this.log({
        kind: 'flow_recorded',
        subject: payload.subject,
        timestamp: payload.timestamp,
        details: {
          direction: payload.direction,
          amount: payload.amount,
          outflow: payload.outflow,
          inflow: payload.inflow,
          epoch: payload.epoch,
        },
      });
    };
    const onRejected = (payload: FlowRejectedEventPayload): void => {
      this.log({
        kind: 'flow_rejected',
        subject: payload.subject,
        timestamp: payload.timestamp,
        details: {
          direction: payload.direction,
          attempted: payload.attempted,
          available: payload.available,
          limit: payload.limit,
          epoch: payload.epoch,
        },
      });
    };

    emitter.on(EVENT_LIMIT_CHANGED, onLimitChanged);
    emitter.on(EVENT_FLOW_RECORDED, onRecorded);
    emitter.on(EVENT_FLOW_REJECTED, onRejected);

    return () => {
      emitter.off(EVENT_LIMIT_CHANGED, onLimitChanged);
      emitter.off(EVENT_FLOW_RECORDED, onRecorded);
      emitter.off(EVENT_FLOW_REJECTED, onRejected);
    };
  }

  /**
   * Append a record.
   *
   * @returns The stored record, or undefined when auditing is disabled.
   */
  log(entry: Omit<FlowAuditRecord, 'id'>): FlowAuditRecord | undefined {
    if (!this.#config.enabled) {
      return undefined;
    }

    const record: FlowAuditRecord = { id: randomUUID(), ...entry };

    if (this.#records.length >= this.#config.maxRecords) {
      this.#records.shift();
    }

    this.#records.push(record);
    return record;
  }

  /**
   * Records matching `filter`, oldest first. Empty when auditing is disabled.
   */
  query(filter: FlowAuditFilter = {}): FlowAuditRecord[] {
    if (!this.#config.enabled) {
      return [];
    }

    const since = filter.since !== undefined ? new Date(filter.since).getTime() : undefined;
    const until = filter.until !== undefined ? new Date(filter.until).getTime() : undefined;

    return this.#records.filter((record) => {
      if (filter.subject !== undefined && record.subject !== filter.subject) return false;
      if (filter.kind !== undefined && record.kind !== filter.kind) return false;
      if (filter.actor !== undefined && record.actor !== filter.actor) return false;
      const at = new Date(record.timestamp).getTime();
      if (since !== undefined && at < since) return false;
      if (until !== undefined && at > until) return false;
      return true;
    });
  }

  getRecords(): readonly FlowAuditRecord[] {
    return [...this.#records];
  }

  get recordCount(): number {
    return this.#records.length;
  }
}
