// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Flow limiter micro-benchmark.
 *
 * Runs the limiter's hot paths and writes a JSON results object to stdout.
 * No external benchmark framework — uses node:perf_hooks only.
 *
 * Usage:
 *   npm run bench > results/typescript.json
 */

import { performance } from 'node:perf_hooks';
import {
  FlowLimiter,
  FlowLimitExceededError,
  ManualClock,
} from '../../packages/flow-limiter/src/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

interface ScenarioResult {
  readonly name: string;
  readonly iterations: number;
  readonly ops_per_sec: number;
  readonly mean_ns: number;
  readonly stdev_ns: number;
}

interface BenchmarkReport {
  readonly runtime: string;
  readonly timestamp: string;
  readonly scenarios: readonly ScenarioResult[];
}

type BenchmarkFn = () => void;

// ─── Timing helpers ───────────────────────────────────────────────────────────

/** Run `fn` for `iterations` cycles and return statistics in nanoseconds. */
function measureIterations(
  fn: BenchmarkFn,
  iterations: number,
): { meanNs: number; stdevNs: number } {
  const samples: number[] = [];

  // Warm-up — not included in results
  for (let warmup = 0; warmup < Math.min(1000, iterations / 10); warmup++) {
    fn();
  }

  for (let index = 0; index < iterations; index++) {
    const start = performance.now();
    fn();
    const end = performance.now();
    samples.push((end - start) * 1_000_000); // convert ms -> ns
  }

  const mean = samples.reduce((sum, value) => sum + value, 0) / samples.length;
  const variance =
    samples.reduce((sum, value) => sum + (value - mean) ** 2, 0) / samples.length;
  const stdev = Math.sqrt(variance);

  return { meanNs: Math.round(mean), stdevNs: Math.round(stdev) };
}

function toScenarioResult(
  name: string,
  iterations: number,
  fn: BenchmarkFn,
): ScenarioResult {
  const { meanNs, stdevNs } = measureIterations(fn, iterations);
  const opsPerSec = meanNs > 0 ? Math.round(1_000_000_000 / meanNs) : 0;
  return { name, iterations, ops_per_sec: opsPerSec, mean_ns: meanNs, stdev_ns: stdevNs };
}

// ─── Scenarios ───────────────────────────────────────────────────────────────

const ITERATIONS = 100_000;

function makeLimiter(auditEnabled = false): { limiter: FlowLimiter; clock: ManualClock } {
  const clock = new ManualClock(0);
  const limiter = new FlowLimiter(
    { subjects: [{ subject: 'bench', limit: 1_000 }], audit: { enabled: auditEnabled } },
    { clock },
  );
  return { limiter, clock };
}

function benchCheck(): ScenarioResult {
  const { limiter } = makeLimiter();

  return toScenarioResult('check_outflow', ITERATIONS, () => {
    limiter.checkOutflow('bench', 10);
  });
}

function benchBalancedRecord(): ScenarioResult {
  const { limiter } = makeLimiter();

  // Matching in/out pairs keep net flow at zero, so nothing is ever rejected.
  return toScenarioResult('record_balanced', ITERATIONS, () => {
    limiter.recordOutflow('bench', 10);
    limiter.recordInflow('bench', 10);
  });
}

function benchRejection(): ScenarioResult {
  const { limiter } = makeLimiter();
  limiter.recordOutflow('bench', 1_000);

  return toScenarioResult('record_rejected', ITERATIONS, () => {
    try {
      limiter.recordOutflow('bench', 1);
    } catch (error: unknown) {
      if (!(error instanceof FlowLimitExceededError)) throw error;
    }
  });
}

function benchEpochRollover(): ScenarioResult {
  const { limiter, clock } = makeLimiter();

  return toScenarioResult('epoch_rollover', ITERATIONS, () => {
    clock.advance(limiter.epochLengthMs);
    limiter.recordOutflow('bench', 1_000);
  });
}

function benchAudited(): ScenarioResult {
  const { limiter } = makeLimiter(true);

  return toScenarioResult('record_audited', ITERATIONS, () => {
    limiter.recordOutflow('bench', 5);
    limiter.recordInflow('bench', 5);
  });
}

// ─── Entry point ─────────────────────────────────────────────────────────────

function main(): void {
  const scenarios: ScenarioResult[] = [
    benchCheck(),
    benchBalancedRecord(),
    benchRejection(),
    benchEpochRollover(),
    benchAudited(),
  ];

  const report: BenchmarkReport = {
    runtime: `node-${process.version}`,
    timestamp: new Date().toISOString(),
    scenarios,
  };

  process.stdout.write(JSON.stringify(report, null, 2) + '\n');
}

main();
