import type { AttemptRecord, CustomerTier, RoutingDecision } from '../router/types.js';
import type { BackendRegistry } from '../router/backend-registry.js';
import type { MeteringAggregates, UsageRecord, UsageSink } from './types.js';
import { hashPrompt } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('metering');

export interface MeteredRequest {
  id: string;
  prompt: string;
  tier: CustomerTier;
  score: number;
}

/**
 * What the dispatcher settled on. A failed request has no serving backend,
 * only the attempts that were made.
 */
export type MeteredOutcome =
  | { decision: RoutingDecision }
  | { decision: null; attempts: AttemptRecord[] };

function emptyAggregates(): MeteringAggregates {
  return {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    totalCost: 0,
    totalRevenue: 0,
    totalMargin: 0,
    negativeMarginCount: 0,
    writeFailures: 0,
    perTier: { basic: 0, premium: 0, enterprise: 0 },
    perBackend: {},
  };
}

/**
 * Builds one usage record per completed request and keeps running totals.
 * Each `record` call updates every aggregate in one synchronous step, so
 * concurrent requests on the event loop never interleave inside it. Sink
 * failures are logged and counted; they never reach the caller.
 */
export class UsageMetering {
  private aggregates = emptyAggregates();
  private recent: UsageRecord[] = [];

  constructor(
    private readonly registry: BackendRegistry,
    private readonly pricing: Record<CustomerTier, number>,
    private readonly sink?: UsageSink,
    private readonly retainRecords = 1_000,
  ) {}

  priceFor(tier: CustomerTier): number {
    return this.pricing[tier];
  }

  record(request: MeteredRequest, outcome: MeteredOutcome, latencyMs: number, success: boolean): UsageRecord {
    const attempts = 'attempts' in outcome ? outcome.attempts : outcome.decision.attempts;
    const serving = success && !('attempts' in outcome) ? outcome.decision : null;
    const cost = serving ? this.registry.getById(serving.backendId).costPerRequest : 0;
    const price = serving ? this.priceFor(request.tier) : 0;

    const record: UsageRecord = {
      requestId: request.id,
      timestamp: new Date().toISOString(),
      tier: request.tier,
      promptHash: hashPrompt(request.prompt),
      score: request.score,
      backendId: serving ? serving.backendId : null,
      backendClass: serving ? serving.backendClass : null,
      attempts,
      latencyMs,
      cost,
      price,
      margin: price - cost,
      success: serving !== null,
    };

    this.accumulate(record);
    this.retain(record);
    this.persist(record);
    return record;
  }

  /** Copy of the running totals. */
  totals(): MeteringAggregates {
    return structuredClone(this.aggregates);
  }

  /** Most recent records, newest last. */
  recentRecords(limit = this.retainRecords): UsageRecord[] {
    return this.recent.slice(-limit);
  }

  private accumulate(record: UsageRecord): void {
    const agg = this.aggregates;
    agg.totalRequests++;
    agg.perTier[record.tier]++;

    if (!record.success) {
      agg.failedRequests++;
      return;
    }

    agg.successfulRequests++;
    agg.totalCost += record.cost;
    agg.totalRevenue += record.price;
    agg.totalMargin += record.margin;

    if (record.margin < 0) {
      agg.negativeMarginCount++;
      log.warn(`Negative margin on ${record.requestId}: tier ${record.tier} price ${record.price} < cost ${record.cost} of ${record.backendId}; check pricing config`);
    }

    if (record.backendId) {
      const entry = agg.perBackend[record.backendId] ?? { requests: 0, totalLatencyMs: 0 };
      entry.requests++;
      entry.totalLatencyMs += record.latencyMs;
      agg.perBackend[record.backendId] = entry;
    }
  }

  private retain(record: UsageRecord): void {
    if (this.retainRecords === 0) return;
    this.recent.push(record);
    if (this.recent.length > this.retainRecords) {
      this.recent.splice(0, this.recent.length - this.retainRecords);
    }
  }

  private persist(record: UsageRecord): void {
    if (!this.sink) return;
    try {
      const pending = this.sink.append(record);
      if (pending instanceof Promise) {
        pending.catch(err => this.writeFailed(record, err));
      }
    } catch (err) {
      this.writeFailed(record, err);
    }
  }

  private writeFailed(record: UsageRecord, err: unknown): void {
    this.aggregates.writeFailures++;
    log.error(`MeteringWriteFailed: usage record ${record.requestId} not persisted`, err);
  }
}
