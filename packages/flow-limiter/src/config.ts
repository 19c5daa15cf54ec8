// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';
import { DEFAULT_EPOCH_LENGTH_MS } from './epoch.js';

// ---------------------------------------------------------------------------
// Audit config
// ---------------------------------------------------------------------------

/**
 * Zod schema for AuditConfig.
 */
export const AuditConfigSchema = z.object({
  /** Whether audit logging is active.  Defaults to true. */
  enabled: z.boolean().default(true),
  /**
   * Maximum number of in-memory audit records before oldest entries are
   * evicted.  Defaults to 10 000.
   */
  maxRecords: z.number().int().positive().default(10_000),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

// ---------------------------------------------------------------------------
// Subject presets
// ---------------------------------------------------------------------------

/**
 * Zod schema for a single pre-registered subject.
 * Subjects declared here are registered by FlowLimiter on construction.
 */
export const SubjectPresetSchema = z.object({
  subject: z.string().min(1),
  limit: z.number().int().nonnegative(),
});

export type SubjectPreset = z.infer<typeof SubjectPresetSchema>;

// ---------------------------------------------------------------------------
// Root limiter config
// ---------------------------------------------------------------------------

export const FlowLimiterConfigSchema = z.object({
  /** Length of one tumbling window. Fixed for the limiter's lifetime. */
  epochLengthMs: z.number().int().positive().default(DEFAULT_EPOCH_LENGTH_MS),
  /** Limit given to subjects registered without an explicit one. */
  defaultLimit: z.number().int().nonnegative().default(0),
  /**
   * Number of epochs (current included) whose counters are kept. Older
   * entries are deleted on the next committed write.
   */
  retainEpochs: z.number().int().positive().default(2),
  subjects: z.array(SubjectPresetSchema).optional(),
  audit: AuditConfigSchema.optional(),
});

export type FlowLimiterConfig = z.infer<typeof FlowLimiterConfigSchema>;
export type FlowLimiterConfigInput = z.input<typeof FlowLimiterConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parse and validate a raw limiter config, throwing InvalidConfigError on
 * failure.
 */
export function parseFlowLimiterConfig(raw: unknown): FlowLimiterConfig {
  const result = FlowLimiterConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse and validate an AuditConfig, throwing InvalidConfigError on failure.
 */
export function parseAuditConfig(raw: unknown): AuditConfig {
  const result = AuditConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}
