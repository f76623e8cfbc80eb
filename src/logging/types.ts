import type { AttemptRecord, BackendClass, CustomerTier } from '../router/types.js';

export interface UsageRecord {
  requestId: string;
  timestamp: string;
  tier: CustomerTier;
  promptHash: string;
  score: number;
  /** Serving backend; null when every candidate failed. */
  backendId: string | null;
  backendClass: BackendClass | null;
  attempts: AttemptRecord[];
  latencyMs: number;
  cost: number;
  price: number;
  margin: number;
  success: boolean;
}

/** Running totals kept by metering since process start. */
export interface MeteringAggregates {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalCost: number;
  totalRevenue: number;
  totalMargin: number;
  negativeMarginCount: number;
  writeFailures: number;
  perTier: Record<CustomerTier, number>;
  perBackend: Record<string, { requests: number; totalLatencyMs: number }>;
}

/** Persistence for usage records, outside the response path. */
export interface UsageSink {
  append(record: UsageRecord): void | Promise<void>;
}

export interface BackendStats {
  /** Requests this backend served. */
  count: number;
  cost: number;
  percentOfRequests: number;
  avgLatencyMs: number;
  /** Calls made to this backend, including failed ones; skipped circuits excluded. */
  calls: number;
  successRate: number;
}

export interface AggregateStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  totalCost: number;
  totalRevenue: number;
  totalMargin: number;
  marginPercent: number;
  backendDistribution: Record<string, BackendStats>;
  tierDistribution: Record<CustomerTier, number>;
  fallbackCount: number;
  periodStart: string;
  periodEnd: string;
  avgLatencyMs: number;
}
