import type { BackendCallOptions } from './types.js';
import { BackendRejectedError, BackendTimeoutError, CallAbortedError } from './types.js';

/**
 * fetch() bounded by `options.timeoutMs` and tied to the caller's signal.
 * Reading the body counts against the same deadline. Resolves to the
 * parsed JSON body of a 2xx response.
 */
export async function requestJson(
  backendId: string,
  url: string,
  init: RequestInit,
  options: BackendCallOptions,
): Promise<unknown> {
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  const onCallerAbort = (): void => controller.abort();
  if (options.signal?.aborted) {
    clearTimeout(timer);
    throw new CallAbortedError(backendId);
  }
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    if (!response.ok) {
      const errorText = await response.text();
      throw new BackendRejectedError(backendId, errorText.slice(0, 500), response.status);
    }
    const body: unknown = await response.json();
    return body;
  } catch (err) {
    if (err instanceof BackendRejectedError) throw err;
    if (timedOut) throw new BackendTimeoutError(backendId, options.timeoutMs);
    if (options.signal?.aborted) throw new CallAbortedError(backendId);
    throw new BackendRejectedError(backendId, err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}
