import type { ModelBackend } from '../router/types.js';
import type { BackendCallOptions, BackendClient, BackendResponse } from './types.js';
import { callOllama, probeOllama } from './ollama.js';
import { callOpenAiCompat, probeOpenAiCompat } from './openai-compat.js';

/** Routes each call to the wire format of the backend's endpoint kind. */
export class HttpBackendClient implements BackendClient {
  generate(backend: ModelBackend, prompt: string, options: BackendCallOptions): Promise<BackendResponse> {
    switch (backend.endpoint.kind) {
      case 'ollama':
        return callOllama(backend, prompt, options);
      case 'openai-compat':
        return callOpenAiCompat(backend, prompt, options);
    }
  }

  probe(backend: ModelBackend, options: BackendCallOptions): Promise<void> {
    switch (backend.endpoint.kind) {
      case 'ollama':
        return probeOllama(backend, options);
      case 'openai-compat':
        return probeOpenAiCompat(backend, options);
    }
  }
}
