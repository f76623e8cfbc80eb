import { describe, it, expect, beforeEach, vi } from 'vitest';
import { UsageMetering } from '../../../src/logging/metering.js';
import { BackendRegistry } from '../../../src/router/backend-registry.js';
import type { UsageRecord, UsageSink } from '../../../src/logging/types.js';
import type { RoutingDecision } from '../../../src/router/types.js';
import { hashPrompt } from '../../../src/utils/hash.js';
import { HEAVY, LIGHT } from '../fakes.js';

const pricing = { basic: 0.01, premium: 0.05, enterprise: 0.2 };

function decision(backendId: string, backendClass: 'lightweight' | 'heavyweight'): RoutingDecision {
  return {
    backendId,
    backendClass,
    attempts: [{ backendId, backendClass, outcome: 'success', latencyMs: 12 }],
    rationale: `Preference ${backendClass}: served by first candidate (${backendClass})`,
  };
}

function request(id: string, tier: 'basic' | 'premium' | 'enterprise' = 'basic') {
  return { id, prompt: 'what is a queue', tier, score: 0.1 };
}

class MemorySink implements UsageSink {
  readonly records: UsageRecord[] = [];
  append(record: UsageRecord): void {
    this.records.push(record);
  }
}

describe('UsageMetering', () => {
  let registry: BackendRegistry;

  beforeEach(() => {
    registry = new BackendRegistry([LIGHT, HEAVY]);
  });

  it('prices a served request at the tier price and the backend cost', () => {
    const metering = new UsageMetering(registry, pricing);
    const record = metering.record(request('r1'), { decision: decision('light-a', 'lightweight') }, 40, true);

    expect(record.cost).toBe(0.001);
    expect(record.price).toBe(0.01);
    expect(record.margin).toBeCloseTo(0.009, 10);
    expect(record.margin).toBe(record.price - record.cost);
    expect(record.backendId).toBe('light-a');
    expect(record.backendClass).toBe('lightweight');
    expect(record.success).toBe(true);
    expect(record.promptHash).toBe(hashPrompt('what is a queue'));
    expect(record.promptHash).toHaveLength(16);
  });

  it('records a failed request at zero cost and price', () => {
    const metering = new UsageMetering(registry, pricing);
    const attempts = [{ backendId: 'heavy-a', backendClass: 'heavyweight' as const, outcome: 'circuit-open' as const, latencyMs: 0 }];

    const record = metering.record(request('r2', 'enterprise'), { decision: null, attempts }, 3, false);

    expect(record).toMatchObject({
      backendId: null,
      backendClass: null,
      cost: 0,
      price: 0,
      margin: 0,
      success: false,
      attempts,
    });
    expect(metering.totals()).toMatchObject({
      totalRequests: 1,
      successfulRequests: 0,
      failedRequests: 1,
      totalRevenue: 0,
      perTier: { basic: 0, premium: 0, enterprise: 1 },
    });
  });

  it('keeps running totals across requests', () => {
    const metering = new UsageMetering(registry, pricing);
    metering.record(request('r1', 'basic'), { decision: decision('light-a', 'lightweight') }, 40, true);
    metering.record(request('r2', 'enterprise'), { decision: decision('heavy-a', 'heavyweight') }, 60, true);
    metering.record(request('r3', 'enterprise'), { decision: decision('heavy-a', 'heavyweight') }, 80, true);

    const totals = metering.totals();
    expect(totals.totalRequests).toBe(3);
    expect(totals.totalCost).toBeCloseTo(0.021, 10);
    expect(totals.totalRevenue).toBeCloseTo(0.41, 10);
    expect(totals.totalMargin).toBeCloseTo(0.389, 10);
    expect(totals.perBackend).toEqual({
      'light-a': { requests: 1, totalLatencyMs: 40 },
      'heavy-a': { requests: 2, totalLatencyMs: 140 },
    });
  });

  it('flags a negative margin', () => {
    const metering = new UsageMetering(registry, { ...pricing, basic: 0.005 });
    const record = metering.record(request('r1'), { decision: decision('heavy-a', 'heavyweight') }, 40, true);

    expect(record.margin).toBeCloseTo(-0.005, 10);
    expect(metering.totals().negativeMarginCount).toBe(1);
  });

  it('returns a copy of the totals', () => {
    const metering = new UsageMetering(registry, pricing);
    const snapshot = metering.totals();
    snapshot.totalRequests = 99;
    expect(metering.totals().totalRequests).toBe(0);
  });

  it('writes every record to the sink', () => {
    const sink = new MemorySink();
    const metering = new UsageMetering(registry, pricing, sink);
    const record = metering.record(request('r1'), { decision: decision('light-a', 'lightweight') }, 40, true);
    expect(sink.records).toEqual([record]);
  });

  it('counts a sink that throws without failing the request', () => {
    const sink: UsageSink = {
      append: () => {
        throw new Error('disk full');
      },
    };
    const metering = new UsageMetering(registry, pricing, sink);

    const record = metering.record(request('r1'), { decision: decision('light-a', 'lightweight') }, 40, true);

    expect(record.success).toBe(true);
    expect(metering.totals().writeFailures).toBe(1);
    expect(metering.totals().totalRequests).toBe(1);
  });

  it('counts a sink whose write rejects later', async () => {
    const append = vi.fn(() => Promise.reject(new Error('disk full')));
    const metering = new UsageMetering(registry, pricing, { append });

    metering.record(request('r1'), { decision: decision('light-a', 'lightweight') }, 40, true);
    expect(metering.totals().writeFailures).toBe(0);

    await new Promise(resolve => setImmediate(resolve));
    expect(metering.totals().writeFailures).toBe(1);
    expect(append).toHaveBeenCalledTimes(1);
  });

  it('retains only the most recent records', () => {
    const metering = new UsageMetering(registry, pricing, undefined, 2);
    for (const id of ['r1', 'r2', 'r3']) {
      metering.record(request(id), { decision: decision('light-a', 'lightweight') }, 10, true);
    }
    expect(metering.recentRecords().map(r => r.requestId)).toEqual(['r2', 'r3']);
    expect(metering.recentRecords(1).map(r => r.requestId)).toEqual(['r3']);
  });

  it('retains nothing when configured with zero', () => {
    const metering = new UsageMetering(registry, pricing, undefined, 0);
    metering.record(request('r1'), { decision: decision('light-a', 'lightweight') }, 10, true);
    expect(metering.recentRecords()).toEqual([]);
  });
});
