// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

// ─── Presets ─────────────────────────────────────────────────────────────────

export const EPOCH_LENGTH_MS = {
  hourly: 3_600_000,
  sixHourly: 21_600_000,
  daily: 86_400_000,
  weekly: 604_800_000,
} as const;

export type EpochPreset = keyof typeof EPOCH_LENGTH_MS;

export const DEFAULT_EPOCH_LENGTH_MS: number = EPOCH_LENGTH_MS.sixHourly;

// ─── Window math ─────────────────────────────────────────────────────────────

/**
 * Index of the tumbling window containing `nowMs`.
 *
 * Windows are aligned to absolute time, not to first use, so two limiters
 * with the same epoch length always agree on the boundary.
 */
export function epochIndex(nowMs: number, epochLengthMs: number): number {
  return Math.floor(nowMs / epochLengthMs);
}

/** Start of the given epoch in milliseconds since the Unix epoch. */
export function epochStartMs(index: number, epochLengthMs: number): number {
  return index * epochLengthMs;
}

/** Instant at which the epoch following the one containing `nowMs` begins. */
export function nextEpochAtMs(nowMs: number, epochLengthMs: number): number {
  return epochStartMs(epochIndex(nowMs, epochLengthMs) + 1, epochLengthMs);
}

/**
 * Oldest epoch index still worth keeping when `retainEpochs` windows
 * (including the current one) are retained.
 */
export function oldestRetainedEpoch(current: number, retainEpochs: number): number {
  return current - (retainEpochs - 1);
}
