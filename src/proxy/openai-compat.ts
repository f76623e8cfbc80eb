import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type { ModelBackend } from '../router/types.js';
import type { BackendCallOptions, BackendResponse } from './types.js';
import { BackendRejectedError } from './types.js';
import { requestJson } from './http.js';

const chatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })).min(1),
});

function headers(backend: ModelBackend): Record<string, string> {
  const result: Record<string, string> = { 'Content-Type': 'application/json' };
  if (backend.endpoint.apiKey) {
    result['Authorization'] = `Bearer ${backend.endpoint.apiKey}`;
  }
  return result;
}

function baseUrl(backend: ModelBackend): string {
  return backend.endpoint.baseUrl.replace(/\/+$/, '');
}

export async function callOpenAiCompat(
  backend: ModelBackend,
  prompt: string,
  options: BackendCallOptions,
): Promise<BackendResponse> {
  const startMs = performance.now();

  const data = await requestJson(backend.id, `${baseUrl(backend)}/chat/completions`, {
    method: 'POST',
    headers: headers(backend),
    body: JSON.stringify({
      model: backend.endpoint.model,
      messages: [{ role: 'user', content: prompt }],
      stream: false,
    }),
  }, options);

  const parsed = chatResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new BackendRejectedError(backend.id, 'malformed chat completion response');
  }

  return {
    text: parsed.data.choices[0]?.message.content ?? '',
    backendId: backend.id,
    latencyMs: Math.round(performance.now() - startMs),
  };
}

export async function probeOpenAiCompat(backend: ModelBackend, options: BackendCallOptions): Promise<void> {
  await requestJson(backend.id, `${baseUrl(backend)}/models`, {
    method: 'GET',
    headers: headers(backend),
  }, options);
}
