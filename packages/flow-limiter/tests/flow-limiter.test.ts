// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, vi } from 'vitest';
import { FlowLimiter } from '../src/limiter.js';
import { ManualClock } from '../src/clock.js';
import { EPOCH_LENGTH_MS } from '../src/epoch.js';
import { FlowCounterOverflowError, FlowLimitExceededError, FlowLimiterError } from '../src/errors.js';
import { EVENT_FLOW_RECORDED, EVENT_FLOW_REJECTED, EVENT_LIMIT_CHANGED } from '../src/events.js';

const SIX_HOURS = EPOCH_LENGTH_MS.sixHourly;

function makeLimiter(limit?: number, startMs = 0): { limiter: FlowLimiter; clock: ManualClock } {
  const clock = new ManualClock(startMs);
  const limiter = new FlowLimiter({ epochLengthMs: SIX_HOURS }, { clock });
  if (limit !== undefined) {
    limiter.setLimit('usdc', limit, 'test-operator');
  }
  return { limiter, clock };
}

function catchError(fn: () => void): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  return undefined;
}

describe('FlowLimiter', () => {
  describe('net flow scenario with six-hour epochs', () => {
    it('admits, rejects and resets exactly at the limit', () => {
      const { limiter, clock } = makeLimiter(100);

      limiter.recordOutflow('usdc', 100);
      expect(() => limiter.recordOutflow('usdc', 1)).toThrow(FlowLimitExceededError);

      limiter.recordInflow('usdc', 1);
      expect(limiter.currentOutflow('usdc')).toBe(100);
      expect(limiter.currentInflow('usdc')).toBe(1);

      limiter.recordOutflow('usdc', 1);
      expect(limiter.currentOutflow('usdc')).toBe(101);

      clock.advance(SIX_HOURS);
      limiter.recordOutflow('usdc', 100);
      expect(limiter.currentOutflow('usdc')).toBe(100);
      expect(limiter.currentInflow('usdc')).toBe(0);
    });
  });

  describe('recordOutflow / recordInflow', () => {
    it('lets inflow earn back outflow headroom within the epoch', () => {
      const { limiter } = makeLimiter(100);
      limiter.recordInflow('usdc', 50);
      limiter.recordOutflow('usdc', 150);
      expect(() => limiter.recordOutflow('usdc', 1)).toThrow(FlowLimitExceededError);
    });

    it('applies the same net rule to inflow', () => {
      const { limiter } = makeLimiter(100);
      limiter.recordOutflow('usdc', 30);
      limiter.recordInflow('usdc', 130);
      expect(() => limiter.recordInflow('usdc', 1)).toThrow(FlowLimitExceededError);
      expect(limiter.currentInflow('usdc')).toBe(130);
    });

    it('leaves counters untouched no matter how often a rejected call is repeated', () => {
      const { limiter } = makeLimiter(10);
      limiter.recordOutflow('usdc', 10);

      expect(() => limiter.recordOutflow('usdc', 5)).toThrow(FlowLimitExceededError);
      const afterOne = limiter.usage('usdc');
      expect(() => limiter.recordOutflow('usdc', 5)).toThrow(FlowLimitExceededError);
      expect(() => limiter.recordOutflow('usdc', 5)).toThrow(FlowLimitExceededError);

      expect(limiter.usage('usdc')).toEqual(afterOne);
      expect(limiter.currentOutflow('usdc')).toBe(10);
    });

    it('does not let flow from one epoch affect the next', () => {
      const { limiter, clock } = makeLimiter(50);
      clock.set(SIX_HOURS - 1);
      limiter.recordOutflow('usdc', 50);
      expect(limiter.availableOutflow('usdc')).toBe(0);

      clock.advance(1);
      expect(limiter.currentOutflow('usdc')).toBe(0);
      expect(limiter.availableOutflow('usdc')).toBe(50);
      limiter.recordOutflow('usdc', 50);
    });

    it('keeps net flow within the limit in both directions for any call sequence', () => {
      const limit = 40;
      const { limiter } = makeLimiter(limit);
      let seed = 7;
      const next = (): number => {
        seed = (seed * 48_271) % 2_147_483_647;
        return seed;
      };

      for (let step = 0; step < 500; step++) {
        const amount = (next() % 25) + 1;
        const record = next() % 2 === 0
          ? () => limiter.recordOutflow('usdc', amount)
          : () => limiter.recordInflow('usdc', amount);
        const error = catchError(record);
        if (error !== undefined) {
          expect(error).toBeInstanceOf(FlowLimitExceededError);
        }
        const net = limiter.currentOutflow('usdc') - limiter.currentInflow('usdc');
        expect(net).toBeLessThanOrEqual(limit);
        expect(-net).toBeLessThanOrEqual(limit);
      }
    });

    it('throws an error carrying the subject, direction and headroom', () => {
      const { limiter } = makeLimiter(100);
      limiter.recordOutflow('usdc', 70);
      const error = catchError(() => limiter.recordOutflow('usdc', 31));

      expect(error).toBeInstanceOf(FlowLimitExceededError);
      expect(error).toBeInstanceOf(FlowLimiterError);
      if (!(error instanceof FlowLimitExceededError)) return;
      expect(error.code).toBe('FLOW_LIMIT_EXCEEDED');
      expect(error.subject).toBe('usdc');
      expect(error.direction).toBe('outflow');
      expect(error.attempted).toBe(31);
      expect(error.available).toBe(30);
      expect(error.limit).toBe(100);
      expect(error.message).toBe(
        'Flow limit exceeded for subject "usdc": outflow of 31 requested, 30 available (limit 100).',
      );
    });

    it('rejects amounts that are not positive safe integers', () => {
      const { limiter } = makeLimiter(100);
      expect(() => limiter.recordOutflow('usdc', 0)).toThrow(RangeError);
      expect(() => limiter.recordOutflow('usdc', -5)).toThrow(RangeError);
      expect(() => limiter.recordInflow('usdc', 1.5)).toThrow(RangeError);
      expect(limiter.currentOutflow('usdc')).toBe(0);
    });

    it('rejects an empty subject identifier', () => {
      const { limiter } = makeLimiter();
      expect(() => limiter.recordOutflow('', 1)).toThrow(RangeError);
    });
  });

  describe('counter bounds', () => {
    const MAX = Number.MAX_SAFE_INTEGER;

    it('refuses a flow that would carry a counter past MAX_SAFE_INTEGER', () => {
      const { limiter } = makeLimiter(MAX);
      limiter.recordInflow('usdc', MAX);
      limiter.recordOutflow('usdc', MAX);

      const error = catchError(() => limiter.recordInflow('usdc', 1));
      expect(error).toBeInstanceOf(FlowCounterOverflowError);
      expect(error).toBeInstanceOf(FlowLimiterError);
      if (error instanceof FlowCounterOverflowError) {
        expect(error.code).toBe('FLOW_COUNTER_OVERFLOW');
        expect(error.direction).toBe('inflow');
        expect(error.attempted).toBe(1);
        expect(error.counter).toBe(MAX);
      }
      expect(limiter.currentInflow('usdc')).toBe(MAX);
    });

    it('keeps enforcing after the limit is lowered on saturated counters', () => {
      const { limiter } = makeLimiter(MAX);
      limiter.recordInflow('usdc', MAX);
      limiter.recordOutflow('usdc', MAX);
      limiter.setLimit('usdc', 1, 'test-operator');

      for (let i = 0; i < 100; i += 1) {
        expect(() => limiter.recordOutflow('usdc', 1)).toThrow(FlowCounterOverflowError);
      }
      expect(limiter.currentOutflow('usdc')).toBe(MAX);
      expect(limiter.availableOutflow('usdc')).toBe(0);
      expect(limiter.checkOutflow('usdc', 1)).toMatchObject({
        permitted: false,
        available: 0,
        reason: 'counter_overflow',
      });
      expect(limiter.audit.query({ kind: 'flow_rejected' })).toHaveLength(100);
    });
  });

  describe('listener failures', () => {
    function makeObservedLimiter(): { limiter: FlowLimiter; onListenerError: ReturnType<typeof vi.fn> } {
      const onListenerError = vi.fn();
      const limiter = new FlowLimiter(
        { epochLengthMs: SIX_HOURS },
        { clock: new ManualClock(), onListenerError },
      );
      limiter.setLimit('usdc', 10, 'test-operator');
      return { limiter, onListenerError };
    }

    it('keeps an admitted flow committed when a flow:recorded listener throws', () => {
      const { limiter, onListenerError } = makeObservedLimiter();
      const failure = new Error('sink unavailable');
      limiter.events.on(EVENT_FLOW_RECORDED, () => {
        throw failure;
      });

      expect(() => limiter.recordOutflow('usdc', 5)).not.toThrow();
      expect(limiter.currentOutflow('usdc')).toBe(5);
      expect(onListenerError).toHaveBeenCalledWith(failure, EVENT_FLOW_RECORDED);
      expect(limiter.audit.query({ kind: 'flow_recorded' })).toHaveLength(1);
    });

    it('still throws FlowLimitExceededError when a flow:rejected listener throws', () => {
      const { limiter, onListenerError } = makeObservedLimiter();
      const failure = new Error('sink unavailable');
      limiter.events.on(EVENT_FLOW_REJECTED, () => {
        throw failure;
      });

      expect(() => limiter.recordOutflow('usdc', 11)).toThrow(FlowLimitExceededError);
      expect(limiter.currentOutflow('usdc')).toBe(0);
      expect(onListenerError).toHaveBeenCalledWith(failure, EVENT_FLOW_REJECTED);
    });
  });

  describe('disabled limit', () => {
    it('admits every call and never moves the counters when the limit is 0', () => {
      const { limiter } = makeLimiter(0);
      const onRecorded = vi.fn();
      limiter.events.on(EVENT_FLOW_RECORDED, onRecorded);

      for (let index = 0; index < 20; index++) {
        limiter.recordOutflow('usdc', 1_000_000);
        limiter.recordInflow('usdc', 3);
      }

      expect(limiter.currentOutflow('usdc')).toBe(0);
      expect(limiter.currentInflow('usdc')).toBe(0);
      expect(onRecorded).not.toHaveBeenCalled();
      expect(limiter.availableOutflow('usdc')).toBe(Infinity);
      expect(limiter.usage('usdc').enforced).toBe(false);
    });

    it('auto-registers unknown subjects with the default limit', () => {
      const clock = new ManualClock();
      const limiter = new FlowLimiter({ defaultLimit: 5 }, { clock });
      expect(limiter.hasSubject('dai')).toBe(false);

      limiter.recordOutflow('dai', 5);
      expect(limiter.hasSubject('dai')).toBe(true);
      expect(limiter.currentLimit('dai')).toBe(5);
      expect(() => limiter.recordOutflow('dai', 1)).toThrow(FlowLimitExceededError);
    });
  });

  describe('setLimit', () => {
    it('immediately admits an amount that was rejected before the limit was raised', () => {
      const { limiter } = makeLimiter(50);
      limiter.recordOutflow('usdc', 50);
      expect(() => limiter.recordOutflow('usdc', 10)).toThrow(FlowLimitExceededError);

      limiter.setLimit('usdc', 60);
      limiter.recordOutflow('usdc', 10);
      expect(limiter.currentOutflow('usdc')).toBe(60);
    });

    it('keeps recorded flow when the limit is lowered but blocks further flow', () => {
      const { limiter } = makeLimiter(100);
      limiter.recordOutflow('usdc', 80);

      limiter.setLimit('usdc', 50);
      expect(limiter.currentOutflow('usdc')).toBe(80);
      expect(() => limiter.recordOutflow('usdc', 1)).toThrow(FlowLimitExceededError);

      limiter.recordInflow('usdc', 1);
      expect(limiter.availableOutflow('usdc')).toBe(0);
      expect(limiter.availableInflow('usdc')).toBe(129);
    });

    it('notifies the onLimitChanged sink with subject, limits and actor', () => {
      const clock = new ManualClock(0);
      const onLimitChanged = vi.fn();
      const limiter = new FlowLimiter({}, { clock, onLimitChanged });

      limiter.setLimit('usdc', 100, 'ops-team');
      limiter.setLimit('usdc', 250);

      expect(onLimitChanged).toHaveBeenCalledTimes(2);
      expect(onLimitChanged).toHaveBeenNthCalledWith(1, {
        subject: 'usdc',
        previousLimit: 0,
        newLimit: 100,
        actor: 'ops-team',
        timestamp: '1970-01-01T00:00:00.000Z',
      });
      expect(onLimitChanged).toHaveBeenNthCalledWith(2, {
        subject: 'usdc',
        previousLimit: 100,
        newLimit: 250,
        actor: 'unknown',
        timestamp: '1970-01-01T00:00:00.000Z',
      });
    });

    it('rejects negative and fractional limits without emitting', () => {
      const { limiter } = makeLimiter(10);
      const onChanged = vi.fn();
      limiter.events.on(EVENT_LIMIT_CHANGED, onChanged);

      expect(() => limiter.setLimit('usdc', -1)).toThrow(RangeError);
      expect(() => limiter.setLimit('usdc', 2.5)).toThrow(RangeError);
      expect(onChanged).not.toHaveBeenCalled();
      expect(limiter.currentLimit('usdc')).toBe(10);
    });
  });

  describe('checkOutflow / checkInflow', () => {
    it('previews the decision without recording anything', () => {
      const { limiter } = makeLimiter(100);
      limiter.recordInflow('usdc', 20);

      const admitted = limiter.checkOutflow('usdc', 120);
      expect(admitted).toEqual({
        subject: 'usdc',
        direction: 'outflow',
        requested: 120,
        limit: 100,
        outflow: 0,
        inflow: 20,
        epoch: 0,
        permitted: true,
        available: 120,
        reason: 'within_limit',
      });

      const refused = limiter.checkInflow('usdc', 81);
      expect(refused.permitted).toBe(false);
      expect(refused.available).toBe(80);
      expect(refused.reason).toBe('exceeds_limit');

      expect(limiter.currentOutflow('usdc')).toBe(0);
      expect(limiter.currentInflow('usdc')).toBe(20);
    });

    it('reports unlimited for disabled subjects and does not register unknown ones', () => {
      const { limiter } = makeLimiter();
      const result = limiter.checkOutflow('wbtc', 10_000);
      expect(result.permitted).toBe(true);
      expect(result.reason).toBe('unlimited');
      expect(result.available).toBe(Infinity);
      expect(limiter.hasSubject('wbtc')).toBe(false);
    });
  });

  describe('queries', () => {
    it('returns zero flow and the default limit for unknown subjects', () => {
      const { limiter } = makeLimiter();
      expect(limiter.currentLimit('missing')).toBe(0);
      expect(limiter.currentOutflow('missing')).toBe(0);
      expect(limiter.currentInflow('missing')).toBe(0);
    });

    it('describes the current epoch window in the usage snapshot', () => {
      const { limiter, clock } = makeLimiter(100);
      clock.set(SIX_HOURS * 3 + 5);
      limiter.recordOutflow('usdc', 30);
      limiter.recordInflow('usdc', 10);

      expect(limiter.usage('usdc')).toEqual({
        subject: 'usdc',
        limit: 100,
        enforced: true,
        epoch: 3,
        epochStart: '1970-01-01T18:00:00.000Z',
        nextEpochAt: '1970-01-02T00:00:00.000Z',
        outflow: 30,
        inflow: 10,
        netFlow: 20,
        availableOutflow: 80,
        availableInflow: 120,
      });
    });

    it('lists usage with the most exposed subject first', () => {
      const { limiter } = makeLimiter(100);
      limiter.registerSubject('dai', 100);
      limiter.registerSubject('eth', 100);
      limiter.recordOutflow('usdc', 30);
      limiter.recordInflow('dai', 50);

      expect(limiter.listUsage().map((usage) => usage.subject)).toEqual(['dai', 'usdc', 'eth']);
    });
  });

  describe('subject registry', () => {
    it('registers with the default limit when none is given', () => {
      const clock = new ManualClock();
      const limiter = new FlowLimiter({ defaultLimit: 7 }, { clock });
      const usage = limiter.registerSubject('dai');
      expect(usage.limit).toBe(7);
      expect(limiter.listSubjects()).toEqual(['dai']);
    });

    it('refuses to register the same subject twice', () => {
      const { limiter } = makeLimiter(100);
      expect(() => limiter.registerSubject('usdc', 5)).toThrow(RangeError);
      expect(limiter.currentLimit('usdc')).toBe(100);
    });

    it('removes a subject and all of its counters', () => {
      const { limiter } = makeLimiter(100);
      limiter.recordOutflow('usdc', 40);
      expect(limiter.removeSubject('usdc')).toBe(true);
      expect(limiter.removeSubject('usdc')).toBe(false);
      expect(limiter.currentOutflow('usdc')).toBe(0);
    });

    it('pre-registers subjects from config', () => {
      const limiter = new FlowLimiter(
        { subjects: [{ subject: 'usdc', limit: 500 }, { subject: 'dai', limit: 0 }] },
        { clock: new ManualClock() },
      );
      expect(limiter.listSubjects()).toEqual(['usdc', 'dai']);
      expect(limiter.currentLimit('usdc')).toBe(500);
    });
  });

  describe('audit trail', () => {
    it('logs limit changes, admitted flows and rejections', () => {
      const { limiter } = makeLimiter(10);
      limiter.recordOutflow('usdc', 10);
      expect(() => limiter.recordOutflow('usdc', 1)).toThrow(FlowLimitExceededError);

      expect(limiter.audit.getRecords().map((record) => record.kind)).toEqual([
        'limit_changed',
        'flow_recorded',
        'flow_rejected',
      ]);

      const [rejected] = limiter.audit.query({ kind: 'flow_rejected' });
      expect(rejected?.details).toEqual({
        direction: 'outflow',
        attempted: 1,
        available: 0,
        limit: 10,
        epoch: 0,
      });
      expect(limiter.audit.query({ actor: 'test-operator' })).toHaveLength(1);
    });

    it('records nothing when auditing is disabled in config', () => {
      const limiter = new FlowLimiter({ audit: { enabled: false } }, { clock: new ManualClock() });
      limiter.setLimit('usdc', 10);
      limiter.recordOutflow('usdc', 5);
      expect(limiter.audit.recordCount).toBe(0);
    });
  });
});
