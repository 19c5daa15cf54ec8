// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { FlowLimiterTracer } from './otel.js';
export type {
  OTelSpanLike,
  OTelTracerLike,
  FlowLimiterOTelConfig,
} from './otel.js';
