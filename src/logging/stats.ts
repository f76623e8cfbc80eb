import type { UsageRecord, AggregateStats } from './types.js';
import type { CustomerTier } from '../router/types.js';

export function computeStats(records: UsageRecord[]): AggregateStats {
  if (records.length === 0) {
    const now = new Date().toISOString();
    return {
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      successRate: 0,
      totalCost: 0,
      totalRevenue: 0,
      totalMargin: 0,
      marginPercent: 0,
      backendDistribution: {},
      tierDistribution: { basic: 0, premium: 0, enterprise: 0 },
      fallbackCount: 0,
      periodStart: now,
      periodEnd: now,
      avgLatencyMs: 0,
    };
  }

  let successful = 0;
  let totalCost = 0;
  let totalRevenue = 0;
  let totalLatencyMs = 0;
  let fallbackCount = 0;

  const backendDist: Record<string, { count: number; cost: number; latencyMs: number }> = {};
  const callDist: Record<string, { calls: number; ok: number }> = {};
  const tierDist: Record<CustomerTier, number> = { basic: 0, premium: 0, enterprise: 0 };

  for (const record of records) {
    tierDist[record.tier]++;
    totalLatencyMs += record.latencyMs;
    if (record.attempts.length > 1) fallbackCount++;

    for (const attempt of record.attempts) {
      if (attempt.outcome === 'circuit-open' || attempt.outcome === 'trial-in-progress') continue;
      const calls = callDist[attempt.backendId] ?? { calls: 0, ok: 0 };
      calls.calls++;
      if (attempt.outcome === 'success') calls.ok++;
      callDist[attempt.backendId] = calls;
    }

    if (!record.success || !record.backendId) continue;

    successful++;
    totalCost += record.cost;
    totalRevenue += record.price;

    const entry = backendDist[record.backendId] ?? { count: 0, cost: 0, latencyMs: 0 };
    entry.count++;
    entry.cost += record.cost;
    entry.latencyMs += record.latencyMs;
    backendDist[record.backendId] = entry;
  }

  const backendDistribution: AggregateStats['backendDistribution'] = {};
  const backendIds = new Set([...Object.keys(backendDist), ...Object.keys(callDist)]);
  for (const backendId of backendIds) {
    const served = backendDist[backendId] ?? { count: 0, cost: 0, latencyMs: 0 };
    const calls = callDist[backendId] ?? { calls: 0, ok: 0 };
    backendDistribution[backendId] = {
      count: served.count,
      cost: served.cost,
      percentOfRequests: (served.count / records.length) * 100,
      avgLatencyMs: served.count > 0 ? Math.round(served.latencyMs / served.count) : 0,
      calls: calls.calls,
      successRate: calls.calls > 0 ? (calls.ok / calls.calls) * 100 : 0,
    };
  }

  const totalMargin = totalRevenue - totalCost;
  const timestamps = records.map(r => r.timestamp).sort();

  return {
    totalRequests: records.length,
    successfulRequests: successful,
    failedRequests: records.length - successful,
    successRate: (successful / records.length) * 100,
    totalCost,
    totalRevenue,
    totalMargin,
    marginPercent: totalRevenue > 0 ? (totalMargin / totalRevenue) * 100 : 0,
    backendDistribution,
    tierDistribution: tierDist,
    fallbackCount,
    periodStart: timestamps[0] ?? '',
    periodEnd: timestamps[timestamps.length - 1] ?? '',
    avgLatencyMs: Math.round(totalLatencyMs / records.length),
  };
}

export function formatStatsTable(stats: AggregateStats, days: number): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(`=== Usage Stats (last ${days} days) ===`);
  lines.push('');
  lines.push(`Total requests:       ${stats.totalRequests.toLocaleString('en-US')}`);
  lines.push(`Success rate:         ${stats.successRate.toFixed(1)}% (${stats.failedRequests} failed)`);
  lines.push(`Total revenue:        $${stats.totalRevenue.toFixed(4)}`);
  lines.push(`Total cost:           $${stats.totalCost.toFixed(4)}`);
  lines.push(`Margin:               $${stats.totalMargin.toFixed(4)} (${stats.marginPercent.toFixed(1)}%)`);
  lines.push(`Fallbacks:            ${stats.fallbackCount}`);
  lines.push('');
  lines.push('Backend Distribution:');

  for (const [backendId, data] of Object.entries(stats.backendDistribution)) {
    const pct = data.percentOfRequests.toFixed(1);
    const ok = data.successRate.toFixed(1);
    lines.push(`  ${backendId.padEnd(24)} ${String(data.count).padStart(6)} requests   ${String(data.avgLatencyMs).padStart(6)}ms avg   ${ok.padStart(5)}% ok   (${pct}%)`);
  }

  lines.push('');
  lines.push('Tier Distribution:');
  for (const [tier, count] of Object.entries(stats.tierDistribution)) {
    const pct = stats.totalRequests > 0 ? ((count / stats.totalRequests) * 100).toFixed(1) : '0.0';
    lines.push(`  ${tier.padEnd(12)} ${String(count).padStart(6)} (${pct}%)`);
  }

  lines.push('');
  lines.push(`Avg latency:          ${stats.avgLatencyMs.toLocaleString('en-US')}ms`);
  lines.push(`Period:               ${stats.periodStart.slice(0, 10)} to ${stats.periodEnd.slice(0, 10)}`);
  lines.push('');

  return lines.join('\n');
}
