import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type { ModelBackend } from '../router/types.js';
import type { BackendCallOptions, BackendResponse } from './types.js';
import { BackendRejectedError } from './types.js';
import { requestJson } from './http.js';

const generateResponseSchema = z.object({
  response: z.string(),
});

function baseUrl(backend: ModelBackend): string {
  return backend.endpoint.baseUrl.replace(/\/+$/, '');
}

export async function callOllama(
  backend: ModelBackend,
  prompt: string,
  options: BackendCallOptions,
): Promise<BackendResponse> {
  const startMs = performance.now();

  const data = await requestJson(backend.id, `${baseUrl(backend)}/api/generate`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      model: backend.endpoint.model,
      prompt,
      stream: false,
    }),
  }, options);

  const parsed = generateResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new BackendRejectedError(backend.id, 'malformed /api/generate response');
  }

  return {
    text: parsed.data.response,
    backendId: backend.id,
    latencyMs: Math.round(performance.now() - startMs),
  };
}

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

/**
 * Liveness check: the server answers /api/tags and has the backend's
 * model pulled.
 */
export async function probeOllama(backend: ModelBackend, options: BackendCallOptions): Promise<void> {
  const data = await requestJson(backend.id, `${baseUrl(backend)}/api/tags`, { method: 'GET' }, options);
  const parsed = tagsResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new BackendRejectedError(backend.id, 'malformed /api/tags response');
  }
  const wanted = backend.endpoint.model;
  const present = parsed.data.models.some(m => m.name === wanted || m.name === `${wanted}:latest`);
  if (!present) {
    throw new BackendRejectedError(backend.id, `model ${wanted} is not available`);
  }
}
