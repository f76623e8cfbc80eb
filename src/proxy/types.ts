import type { ModelBackend } from '../router/types.js';

export interface BackendCallOptions {
  timeoutMs: number;
  /** Caller-side cancellation, e.g. the client disconnected. */
  signal?: AbortSignal;
}

export interface BackendResponse {
  text: string;
  backendId: string;
  latencyMs: number;
}

/**
 * Transport to a model backend. The dispatcher and health monitor only see
 * this interface; tests substitute in-process fakes.
 */
export interface BackendClient {
  generate(backend: ModelBackend, prompt: string, options: BackendCallOptions): Promise<BackendResponse>;
  probe(backend: ModelBackend, options: BackendCallOptions): Promise<void>;
}

export type BackendErrorKind = 'BackendTimeout' | 'BackendRejected';

export abstract class BackendError extends Error {
  abstract readonly kind: BackendErrorKind;
  readonly backendId: string;

  constructor(backendId: string, message: string) {
    super(message);
    this.backendId = backendId;
  }
}

export class BackendTimeoutError extends BackendError {
  readonly kind = 'BackendTimeout';
  readonly timeoutMs: number;

  constructor(backendId: string, timeoutMs: number) {
    super(backendId, `Backend ${backendId} timed out after ${timeoutMs}ms`);
    this.name = 'BackendTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The backend answered with an error, or could not be reached at all.
 * Carries the HTTP status when there was one.
 */
export class BackendRejectedError extends BackendError {
  readonly kind = 'BackendRejected';
  readonly status: number | undefined;

  constructor(backendId: string, message: string, status?: number) {
    super(backendId, status !== undefined
      ? `Backend ${backendId} error (${status}): ${message}`
      : `Backend ${backendId} error: ${message}`);
    this.name = 'BackendRejectedError';
    this.status = status;
  }
}

/** Thrown when the caller's signal aborted the call. */
export class CallAbortedError extends Error {
  constructor(backendId: string) {
    super(`Call to ${backendId} aborted by caller`);
    this.name = 'CallAbortedError';
  }
}
