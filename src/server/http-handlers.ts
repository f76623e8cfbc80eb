import type http from 'node:http';
import { z } from 'zod';
import type { BackendRegistry } from '../router/backend-registry.js';
import type { HealthMonitor } from '../router/health-monitor.js';
import type { UsageMetering } from '../logging/metering.js';
import type { UsageLogReader } from '../logging/reader.js';
import type { ErrorKind } from '../router/errors.js';
import type { RequestGateway, GatewayResult } from './gateway.js';
import { computeStats } from '../logging/stats.js';
import { formatZodError } from '../config/schema.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

export interface HandlerDeps {
  gateway: RequestGateway;
  registry: BackendRegistry;
  monitor: HealthMonitor;
  metering: UsageMetering;
  usageReader: UsageLogReader;
}

const generateBodySchema = z.object({
  prompt: z.string(),
  // Any string passes here; the gateway owns tier validation.
  customer_tier: z.string(),
  complexity_hint: z.union([z.enum(['low', 'medium', 'high']), z.number()]).optional(),
});

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidTier: 400,
  InvalidRequest: 400,
  RateLimited: 429,
  AllBackendsUnavailable: 503,
  Cancelled: 499,
  InternalError: 500,
};

export function statusFor(result: GatewayResult): number {
  return result.status === 'success' ? 200 : STATUS_BY_KIND[result.error_kind];
}

// ─── GET /health ───────────────────────────────────────────────────────

export function handleHealth(
  _req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HandlerDeps,
): void {
  const counts = deps.registry.countByHealth();
  const anyUsable = counts.closed + counts['half-open'] > 0;
  sendJson(res, anyUsable ? 200 : 503, {
    status: anyUsable ? 'ok' : 'degraded',
    uptime: Math.round(process.uptime()),
    backends: {
      closed: counts.closed,
      open: counts.open,
      halfOpen: counts['half-open'],
    },
  });
}

// ─── GET /backends ─────────────────────────────────────────────────────

export function handleBackends(
  _req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HandlerDeps,
): void {
  const breakers = new Map(deps.monitor.status().map(s => [s.id, s]));
  const backends = deps.registry.snapshot().map(b => ({
    id: b.id,
    displayName: b.displayName,
    backendClass: b.backendClass,
    kind: b.endpoint.kind,
    model: b.endpoint.model,
    costPerRequest: b.costPerRequest,
    health: b.health,
    consecutiveFailures: breakers.get(b.id)?.consecutiveFailures ?? 0,
    retryInMs: breakers.get(b.id)?.retryInMs ?? 0,
  }));
  sendJson(res, 200, { backends });
}

// ─── GET /stats ────────────────────────────────────────────────────────

export function handleStats(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HandlerDeps,
): void {
  const url = new URL(req.url ?? '/', 'http://localhost');
  const days = parseInt(url.searchParams.get('days') ?? '30', 10) || 30;

  const since = new Date();
  since.setDate(since.getDate() - days);
  const records = deps.usageReader.readSince(since.toISOString());

  sendJson(res, 200, {
    period: { days, since: since.toISOString() },
    stats: computeStats(records),
    live: deps.metering.totals(),
  });
}

// ─── POST /v1/generate ─────────────────────────────────────────────────

export async function handleGenerate(
  body: unknown,
  res: http.ServerResponse,
  deps: HandlerDeps,
): Promise<void> {
  const parsed = generateBodySchema.safeParse(body);
  if (!parsed.success) {
    sendJson(res, 400, {
      status: 'error',
      error_kind: 'InvalidRequest',
      message: formatZodError(parsed.error),
      retryable: false,
    });
    return;
  }

  // Abort the backend call if the client goes away before we answer.
  const controller = new AbortController();
  const onClose = (): void => {
    if (!res.writableEnded) controller.abort();
  };
  res.on('close', onClose);

  try {
    const result = await deps.gateway.handle(parsed.data, controller.signal);
    if (controller.signal.aborted) {
      log.debug(`Client disconnected before response for ${result.request_id}`);
      return;
    }
    sendJson(res, statusFor(result), result);
  } finally {
    res.off('close', onClose);
  }
}

export function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data, null, 2);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

export function sendError(res: http.ServerResponse, status: number, kind: ErrorKind, message: string): void {
  sendJson(res, status, { status: 'error', error_kind: kind, message, retryable: false });
}
