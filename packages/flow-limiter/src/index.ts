// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// ─── Core class ──────────────────────────────────────────────────────────────
export { FlowLimiter } from './limiter.js';
export type { FlowLimiterOptions } from './limiter.js';

// ─── Types ───────────────────────────────────────────────────────────────────
export type {
  FlowDirection,
  SubjectFlowState,
  FlowCheckReason,
  FlowCheckResult,
  FlowUsage,
} from './types.js';

// ─── Configuration ───────────────────────────────────────────────────────────
export type {
  FlowLimiterConfig,
  FlowLimiterConfigInput,
  AuditConfig,
  SubjectPreset,
} from './config.js';
export {
  FlowLimiterConfigSchema,
  AuditConfigSchema,
  SubjectPresetSchema,
  parseFlowLimiterConfig,
  parseAuditConfig,
} from './config.js';

// ─── Errors ──────────────────────────────────────────────────────────────────
export {
  FlowLimiterError,
  FlowLimitExceededError,
  FlowCounterOverflowError,
  InvalidConfigError,
} from './errors.js';

// ─── Time ────────────────────────────────────────────────────────────────────
export type { Clock } from './clock.js';
export { systemClock, ManualClock } from './clock.js';
export type { EpochPreset } from './epoch.js';
export {
  EPOCH_LENGTH_MS,
  DEFAULT_EPOCH_LENGTH_MS,
  epochIndex,
  epochStartMs,
  nextEpochAtMs,
  oldestRetainedEpoch,
} from './epoch.js';

// ─── Events & audit ──────────────────────────────────────────────────────────
export {
  FlowEventEmitter,
  EVENT_LIMIT_CHANGED,
  EVENT_FLOW_RECORDED,
  EVENT_FLOW_REJECTED,
} from './events.js';
export type {
  FlowEventName,
  FlowEventListener,
  FlowEventPayloadMap,
  FlowEventEmitterOptions,
  ListenerErrorHandler,
  LimitChangedEventPayload,
  FlowRecordedEventPayload,
  FlowRejectedEventPayload,
} from './events.js';
export { FlowAuditLog } from './audit.js';
export type { FlowAuditRecord, FlowAuditFilter, FlowAuditKind } from './audit.js';

// ─── State utilities ─────────────────────────────────────────────────────────
export {
  createSubjectState,
  flowAt,
  availableFlow,
  evaluateFlow,
  commitFlow,
  pruneEpochs,
  buildUsage,
} from './state.js';

// ─── Telemetry ───────────────────────────────────────────────────────────────
export { FlowLimiterTracer } from './telemetry/index.js';
export type { OTelSpanLike, OTelTracerLike, FlowLimiterOTelConfig } from './telemetry/index.js';
