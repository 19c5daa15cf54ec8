// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * bridge_transfer.ts
 *
 * Demonstrates the limiter as a pre-commit gate in a token bridge:
 *   1. Register a subject with a six-hour net flow limit.
 *   2. Record each transfer's flow before finalising it.
 *   3. Abort the transfer when the limiter rejects it.
 *   4. Show that inbound volume earns back outbound headroom.
 *
 * Run with:  npx tsx packages/flow-limiter/examples/bridge_transfer.ts
 */

import {
  FlowLimiter,
  FlowLimitExceededError,
  ManualClock,
  EPOCH_LENGTH_MS,
} from '../src/index.js';
import type { FlowDirection } from '../src/index.js';

// ─── Setup ────────────────────────────────────────────────────────────────────

const clock = new ManualClock(Date.UTC(2026, 0, 1));
const limiter = new FlowLimiter(
  { epochLengthMs: EPOCH_LENGTH_MS.sixHourly },
  {
    clock,
    onLimitChanged: ({ subject, previousLimit, newLimit, actor }) => {
      console.log(`[audit] ${actor} set ${subject} limit ${previousLimit} -> ${newLimit}`);
    },
  },
);

// Authorization happens here, outside the limiter.
limiter.setLimit('usdc', 1_000, 'bridge-operator');

// ─── Simulated transfers ──────────────────────────────────────────────────────

const transfers: ReadonlyArray<{ direction: FlowDirection; amount: number }> = [
  { direction: 'outflow', amount: 600 },
  { direction: 'outflow', amount: 500 },
  { direction: 'inflow', amount: 300 },
  { direction: 'outflow', amount: 500 },
  { direction: 'outflow', amount: 250 },
];

for (const [index, transfer] of transfers.entries()) {
  try {
    if (transfer.direction === 'outflow') {
      limiter.recordOutflow('usdc', transfer.amount);
    } else {
      limiter.recordInflow('usdc', transfer.amount);
    }
    console.log(`Transfer ${index + 1}: ${transfer.direction} ${transfer.amount} FINALISED`);
  } catch (error: unknown) {
    if (!(error instanceof FlowLimitExceededError)) throw error;
    console.log(
      `Transfer ${index + 1}: ${transfer.direction} ${transfer.amount} ABORTED  ` +
        `available=${error.available}`,
    );
  }
}

// ─── Epoch summary ────────────────────────────────────────────────────────────

const usage = limiter.usage('usdc');

console.log('\n── Flow summary ──────────────────────────────────────');
console.log(`  Subject     : ${usage.subject}`);
console.log(`  Epoch       : ${usage.epoch} (${usage.epochStart} -> ${usage.nextEpochAt})`);
console.log(`  Limit       : ${usage.limit}`);
console.log(`  Outflow     : ${usage.outflow}`);
console.log(`  Inflow      : ${usage.inflow}`);
console.log(`  Net flow    : ${usage.netFlow}`);
console.log(`  Headroom    : out ${usage.availableOutflow} / in ${usage.availableInflow}`);
console.log('──────────────────────────────────────────────────────');

// ─── Next epoch ───────────────────────────────────────────────────────────────

clock.advance(limiter.epochLengthMs);
console.log(`\nAfter rollover the outbound headroom is ${limiter.availableOutflow('usdc')} again.`);
