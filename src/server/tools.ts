import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RequestGateway } from './gateway.js';
import type { BackendRegistry } from '../router/backend-registry.js';
import type { HealthMonitor } from '../router/health-monitor.js';
import type { UsageMetering } from '../logging/metering.js';
import type { UsageLogReader } from '../logging/reader.js';
import type { UsageRecord } from '../logging/types.js';
import { computeStats, formatStatsTable } from '../logging/stats.js';

export interface ToolDeps {
  gateway: RequestGateway;
  registry: BackendRegistry;
  monitor: HealthMonitor;
  metering: UsageMetering;
  usageReader: UsageLogReader;
}

function jsonText(data: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Latest records, newest last: the persisted log, topped up with records
 * still buffered in memory.
 */
export function recentUsage(
  reader: UsageLogReader,
  metering: UsageMetering,
  limit: number,
): UsageRecord[] {
  const persisted = reader.tail(limit);
  const seen = new Set(persisted.map(r => r.requestId));
  const pending = metering.recentRecords(limit).filter(r => !seen.has(r.requestId));
  return [...persisted, ...pending].slice(-limit);
}

function summarize(r: UsageRecord) {
  return {
    requestId: r.requestId,
    timestamp: r.timestamp,
    tier: r.tier,
    score: r.score,
    backend: r.backendId,
    success: r.success,
    attempts: r.attempts.map(a => `${a.backendId}:${a.outcome}`),
    cost: r.cost,
    margin: r.margin,
    latency: `${r.latencyMs}ms`,
  };
}

const complexityHint = z.union([z.enum(['low', 'medium', 'high']), z.number().min(0).max(1)]).optional()
  .describe('Explicit complexity hint: low, medium, high, or a number in [0, 1]');

export function registerTools(server: McpServer, deps: ToolDeps): void {
  const { gateway, registry, monitor, metering, usageReader } = deps;

  // Tool 1: route_request - Classify, route and generate
  server.tool(
    'route_request',
    'Send a prompt through the tier router. The request is classified, matched to a backend class by customer tier, and dispatched with automatic fallback.',
    {
      prompt: z.string().min(1).describe('The prompt to generate a response for'),
      customer_tier: z.string().describe('Customer tier: basic, premium or enterprise'),
      complexity_hint: complexityHint,
    },
    async ({ prompt, customer_tier, complexity_hint }) => {
      const result = await gateway.handle({ prompt, customer_tier, complexity_hint });
      return jsonText(result, result.status === 'error');
    },
  );

  // Tool 2: classify_prompt - Diagnostic (no backend call)
  server.tool(
    'classify_prompt',
    'Score prompt complexity and show the backend class preference per tier without calling any backend.',
    {
      prompt: z.string().min(1).describe('The prompt text to classify'),
      complexity_hint: complexityHint,
    },
    async ({ prompt, complexity_hint }) => {
      const preview = gateway.preview(prompt, complexity_hint);
      return jsonText({
        score: preview.score.value,
        features: preview.score.features,
        preference: preview.preference,
      });
    },
  );

  // Tool 3: get_backend_status - Circuit breaker view
  server.tool(
    'get_backend_status',
    'List registered backends with their class, cost and circuit breaker state.',
    {},
    async () => {
      const breakers = new Map(monitor.status().map(s => [s.id, s]));
      return jsonText({
        backends: registry.snapshot().map(b => ({
          id: b.id,
          backendClass: b.backendClass,
          model: b.endpoint.model,
          costPerRequest: b.costPerRequest,
          health: b.health,
          consecutiveFailures: breakers.get(b.id)?.consecutiveFailures ?? 0,
          retryInMs: breakers.get(b.id)?.retryInMs ?? 0,
        })),
      });
    },
  );

  // Tool 4: get_usage_stats - Cost and margin over a period
  server.tool(
    'get_usage_stats',
    'Get usage statistics from the usage log: revenue, cost, margin, and backend/tier distribution for a time period.',
    {
      days: z.number().int().positive().optional().default(30)
        .describe('Lookback period in days'),
      format: z.enum(['json', 'table']).optional().default('json')
        .describe('json for structured output, table for a readable summary'),
    },
    async ({ days, format }) => {
      const since = new Date();
      since.setDate(since.getDate() - days);
      const stats = computeStats(usageReader.readSince(since.toISOString()));

      if (format === 'table') {
        return { content: [{ type: 'text' as const, text: formatStatsTable(stats, days) }] };
      }
      return jsonText({ stats, live: metering.totals() });
    },
  );

  // Tool 5: get_recent_usage_log - Inspect recent decisions
  server.tool(
    'get_recent_usage_log',
    'View the most recent usage records: which backend served each request, the attempts made, cost and margin.',
    {
      limit: z.number().int().positive().optional().default(10)
        .describe('Number of recent entries to return'),
    },
    async ({ limit }) => {
      const entries = recentUsage(usageReader, metering, limit).map(summarize);
      return jsonText({ entries, count: entries.length });
    },
  );

  // Tool 6: get_usage_record - One request in full
  server.tool(
    'get_usage_record',
    'Look up the full usage record of one request by its request ID.',
    {
      request_id: z.string().min(1).describe('Request ID returned by route_request'),
    },
    async ({ request_id }) => {
      const record = usageReader.getEntryById(request_id)
        ?? metering.recentRecords().find(r => r.requestId === request_id);
      if (!record) {
        return jsonText({ error: `No usage record for request ${request_id}` }, true);
      }
      return jsonText(record);
    },
  );
}
