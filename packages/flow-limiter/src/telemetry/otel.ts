// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { FlowLimiter } from '../limiter.js';
import type { FlowDirection } from '../types.js';

/**
 * Minimal OpenTelemetry Span interface.
 *
 * This avoids a hard dependency on @opentelemetry/api.  Any OTel-compatible
 * tracer that produces spans with these methods can be used.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  addEvent(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

/**
 * Minimal OpenTelemetry Tracer interface.
 */
export interface OTelTracerLike {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpanLike;
}

export interface FlowLimiterOTelConfig {
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans. Defaults to "flow-limiter". */
  serviceName?: string;
}

// Mirrors SpanStatusCode from @opentelemetry/api.
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * FlowLimiterTracer records each flow decision as an OpenTelemetry span.
 *
 * Usage:
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const flowTracer = new FlowLimiterTracer({ tracer: trace.getTracer('bridge') });
 * flowTracer.traceRecord(limiter, 'usdc', 'outflow', 250);
 * ```
 *
 * A rejection marks the span as an error and rethrows the original
 * FlowLimitExceededError.
 */
export class FlowLimiterTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: FlowLimiterOTelConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'flow-limiter';
  }

  traceRecord(limiter: FlowLimiter, subject: string, direction: FlowDirection, amount: number): void {
    const span = this.#tracer.startSpan(`flow.record.${direction}`, {
      attributes: {
        'service.name': this.#serviceName,
        'flow.subject': subject,
        'flow.direction': direction,
        'flow.amount': amount,
        'flow.epoch': limiter.currentEpoch(),
      },
    });

    try {
      if (direction === 'outflow') {
        limiter.recordOutflow(subject, amount);
      } else {
        limiter.recordInflow(subject, amount);
      }
      span.setAttribute('flow.decision', 'admit');
      span.setAttribute('flow.limit', limiter.currentLimit(subject));
      span.setStatus({ code: SPAN_STATUS_OK });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      span.setAttribute('flow.decision', 'reject');
      span.setStatus({ code: SPAN_STATUS_ERROR, message });
      span.addEvent('flow.rejected', { 'error.message': message });
      throw error;
    } finally {
      span.end();
    }
  }
}
