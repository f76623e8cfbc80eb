import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type http from 'node:http';
import os from 'node:os';
import path from 'node:path';
import { createHttpProxy } from '../../../src/server/http-proxy.js';
import { RequestGateway } from '../../../src/server/gateway.js';
import { DEFAULT_WEIGHTS } from '../../../src/classifier/engine.js';
import { BackendRegistry } from '../../../src/router/backend-registry.js';
import { HealthMonitor } from '../../../src/router/health-monitor.js';
import { TierPolicyResolver } from '../../../src/router/policy.js';
import { Dispatcher } from '../../../src/proxy/dispatcher.js';
import { UsageMetering } from '../../../src/logging/metering.js';
import { UsageLogReader } from '../../../src/logging/reader.js';
import { BREAKER, FakeBackendClient, HEAVY, LIGHT, failCalls } from '../fakes.js';

describe('HTTP proxy', () => {
  let server: http.Server;
  let baseUrl: string;
  let monitor: HealthMonitor;
  let client: FakeBackendClient;

  beforeEach(async () => {
    const registry = new BackendRegistry([LIGHT, HEAVY]);
    client = new FakeBackendClient();
    monitor = new HealthMonitor(registry, client, { probeIntervalMs: 60_000, probeTimeoutMs: 1_000, breaker: BREAKER });
    const metering = new UsageMetering(registry, { basic: 0.01, premium: 0.05, enterprise: 0.2 });
    const gateway = new RequestGateway({
      weights: DEFAULT_WEIGHTS,
      policy: new TierPolicyResolver(),
      dispatcher: new Dispatcher(registry, monitor, client, { timeoutMs: 1_000, maxAttempts: 4 }),
      metering,
    });
    const usageReader = new UsageLogReader(path.join(os.tmpdir(), 'http-proxy-test-missing.jsonl'));

    server = createHttpProxy({ gateway, registry, monitor, metering, usageReader });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    const { port } = address;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  function openAll(): void {
    for (const id of ['light-a', 'heavy-a']) {
      failCalls(monitor, id, BREAKER.failureThreshold);
    }
  }

  function generate(body: string): Promise<Response> {
    return fetch(`${baseUrl}/v1/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  it('reports ok health while a backend is usable', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      backends: { closed: 2, open: 0, halfOpen: 0 },
    });
  });

  it('reports degraded health when every circuit is open', async () => {
    openAll();
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'degraded' });
  });

  it('generates through the gateway', async () => {
    const res = await generate(JSON.stringify({ prompt: 'hello there', customer_tier: 'basic' }));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'success',
      model_used: 'light-a',
      text: 'light-a: hello there',
    });
  });

  it('maps an unknown tier to 400', async () => {
    const res = await generate(JSON.stringify({ prompt: 'hello', customer_tier: 'gold' }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error_kind: 'InvalidTier' });
  });

  it('maps exhausted backends to 503', async () => {
    openAll();
    const res = await generate(JSON.stringify({ prompt: 'hello', customer_tier: 'enterprise' }));
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ error_kind: 'AllBackendsUnavailable', retryable: true });
  });

  it('rejects a body that is not JSON', async () => {
    const res = await generate('{not json');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      status: 'error',
      error_kind: 'InvalidRequest',
      message: 'Request body must be valid JSON',
      retryable: false,
    });
  });

  it('answers an oversized body with 413', async () => {
    const res = await generate(JSON.stringify({ prompt: 'x'.repeat(2 * 1024 * 1024), customer_tier: 'basic' }));
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      status: 'error',
      error_kind: 'InvalidRequest',
      message: 'Request body exceeds 1048576 bytes',
      retryable: false,
    });
    expect(client.generateCalls).toEqual([]);
  });

  it('rejects a body without a prompt', async () => {
    const res = await generate(JSON.stringify({ customer_tier: 'basic' }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error_kind: 'InvalidRequest', message: 'prompt: Required' });
  });

  it('lists backends with their breaker state', async () => {
    failCalls(monitor, 'heavy-a', 1);
    const res = await fetch(`${baseUrl}/backends`);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      backends: [
        { id: 'light-a', backendClass: 'lightweight', health: 'closed', consecutiveFailures: 0 },
        { id: 'heavy-a', backendClass: 'heavyweight', health: 'closed', consecutiveFailures: 1 },
      ],
    });
  });

  it('serves usage stats for the requested period', async () => {
    await generate(JSON.stringify({ prompt: 'hello', customer_tier: 'basic' }));
    const res = await fetch(`${baseUrl}/stats?days=7`);
    expect(await res.json()).toMatchObject({
      period: { days: 7 },
      stats: { totalRequests: 0 },
      live: { totalRequests: 1, successfulRequests: 1 },
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error_kind: 'InvalidRequest', message: 'No route for GET /nope' });
  });
});
