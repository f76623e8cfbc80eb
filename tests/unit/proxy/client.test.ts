import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'node:http';
import { HttpBackendClient } from '../../../src/proxy/client.js';
import { BackendRejectedError, BackendTimeoutError, CallAbortedError } from '../../../src/proxy/types.js';
import type { ModelBackend } from '../../../src/router/types.js';

interface Seen {
  method: string;
  url: string;
  authorization: string | undefined;
  body: string;
}

/** In-process stand-in for an Ollama server and an OpenAI-compatible one. */
function startUpstream(seen: Seen[]): http.Server {
  return http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (c: Buffer) => chunks.push(c));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf-8');
      seen.push({ method: req.method ?? '', url: req.url ?? '', authorization: req.headers.authorization, body });
      const json = (status: number, data: unknown): void => {
        res.writeHead(status, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(data));
      };

      switch (req.url) {
        case '/ok/api/generate':
          return json(200, { response: 'pong' });
        case '/ok/api/tags':
          return json(200, { models: [{ name: 'light:1b' }, { name: 'other:latest' }] });
        case '/broken/api/generate':
          return json(500, { error: 'model crashed' });
        case '/garbled/api/generate':
          return json(200, { unexpected: true });
        case '/v1/chat/completions':
          return json(200, { choices: [{ message: { content: 'chat pong' } }] });
        case '/v1/models':
          return json(200, { data: [] });
        case '/slow/api/generate':
          return; // never answers
        default:
          return json(404, { error: 'not found' });
      }
    });
  });
}

function backend(kind: 'ollama' | 'openai-compat', baseUrl: string, model = 'light:1b', apiKey?: string): ModelBackend {
  return {
    id: `${kind}-test`,
    displayName: 'Test',
    backendClass: 'lightweight',
    endpoint: { kind, baseUrl, model, apiKey },
    costPerRequest: 0,
    health: 'closed',
  };
}

describe('HttpBackendClient', () => {
  const seen: Seen[] = [];
  const client = new HttpBackendClient();
  let server: http.Server;
  let root: string;

  beforeAll(async () => {
    server = startUpstream(seen);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    const { port } = address;
    root = `http://127.0.0.1:${port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('generates through the ollama API', async () => {
    const response = await client.generate(backend('ollama', `${root}/ok/`), 'ping', { timeoutMs: 2_000 });

    expect(response.text).toBe('pong');
    expect(response.backendId).toBe('ollama-test');
    const request = seen.find(s => s.url === '/ok/api/generate');
    expect(request?.method).toBe('POST');
    expect(JSON.parse(request?.body ?? '{}')).toEqual({ model: 'light:1b', prompt: 'ping', stream: false });
  });

  it('probes ollama for the configured model', async () => {
    await expect(client.probe(backend('ollama', `${root}/ok`), { timeoutMs: 2_000 })).resolves.toBeUndefined();
    await expect(client.probe(backend('ollama', `${root}/ok`, 'other'), { timeoutMs: 2_000 })).resolves.toBeUndefined();
    await expect(client.probe(backend('ollama', `${root}/ok`, 'missing:7b'), { timeoutMs: 2_000 }))
      .rejects.toThrow('Backend ollama-test error: model missing:7b is not available');
  });

  it('surfaces upstream errors with their status', async () => {
    const err = await client.generate(backend('ollama', `${root}/broken`), 'ping', { timeoutMs: 2_000 })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BackendRejectedError);
    if (!(err instanceof BackendRejectedError)) return;
    expect(err.status).toBe(500);
    expect(err.message).toBe('Backend ollama-test error (500): {"error":"model crashed"}');
  });

  it('rejects a malformed success body', async () => {
    await expect(client.generate(backend('ollama', `${root}/garbled`), 'ping', { timeoutMs: 2_000 }))
      .rejects.toThrow('Backend ollama-test error: malformed /api/generate response');
  });

  it('times out a backend that never answers', async () => {
    await expect(client.generate(backend('ollama', `${root}/slow`), 'ping', { timeoutMs: 50 }))
      .rejects.toBeInstanceOf(BackendTimeoutError);
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    const pending = client.generate(backend('ollama', `${root}/slow`), 'ping', {
      timeoutMs: 5_000,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 20);
    await expect(pending).rejects.toBeInstanceOf(CallAbortedError);
  });

  it('speaks the chat completions API with a bearer token', async () => {
    const target = backend('openai-compat', `${root}/v1`, 'heavy-70b', 'test-secret');

    const response = await client.generate(target, 'ping', { timeoutMs: 2_000 });
    await client.probe(target, { timeoutMs: 2_000 });

    expect(response.text).toBe('chat pong');
    const chat = seen.find(s => s.url === '/v1/chat/completions');
    expect(chat?.authorization).toBe('Bearer test-secret');
    expect(JSON.parse(chat?.body ?? '{}')).toEqual({
      model: 'heavy-70b',
      messages: [{ role: 'user', content: 'ping' }],
      stream: false,
    });
    expect(seen.some(s => s.url === '/v1/models' && s.method === 'GET')).toBe(true);
  });
});
