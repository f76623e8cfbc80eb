import { performance } from 'node:perf_hooks';
import type { BackendClient, BackendResponse } from './types.js';
import { BackendError, CallAbortedError } from './types.js';
import type { BackendRegistry } from '../router/backend-registry.js';
import type { HealthReporter, HealthTicket } from '../router/health-monitor.js';
import type { AttemptOutcome, AttemptRecord, BackendClass, ModelBackend, RoutingDecision } from '../router/types.js';
import { AllBackendsUnavailableError, RequestCancelledError } from '../router/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('dispatcher');

export interface DispatcherOptions {
  timeoutMs: number;
  /** Upper bound on backend calls per request; skipped backends don't count. */
  maxAttempts: number;
}

export interface DispatchRequest {
  id: string;
  prompt: string;
}

export interface DispatchSuccess {
  decision: RoutingDecision;
  response: BackendResponse;
}

function describeFailure(err: unknown): { outcome: AttemptOutcome; detail: string } {
  if (err instanceof BackendError) {
    return { outcome: err.kind === 'BackendTimeout' ? 'timeout' : 'rejected', detail: err.message };
  }
  return { outcome: 'rejected', detail: err instanceof Error ? err.message : String(err) };
}

/**
 * Walks a preference list of backend classes and returns the first
 * successful backend response. Within a class, backends are tried in
 * registry order; open circuits are skipped without a call.
 */
export class Dispatcher {
  constructor(
    private readonly registry: BackendRegistry,
    private readonly health: HealthReporter,
    private readonly client: BackendClient,
    private readonly options: DispatcherOptions,
  ) {}

  async dispatch(
    request: DispatchRequest,
    preference: BackendClass[],
    signal?: AbortSignal,
  ): Promise<DispatchSuccess> {
    const attempts: AttemptRecord[] = [];
    let calls = 0;

    for (const backendClass of preference) {
      const candidates = this.registry.get(backendClass);
      if (candidates.length === 0) {
        log.debug(`Request ${request.id}: no ${backendClass} backends registered`);
        continue;
      }

      for (const backend of candidates) {
        if (signal?.aborted) {
          throw new RequestCancelledError(attempts);
        }
        if (calls >= this.options.maxAttempts) {
          throw this.exhausted(request, attempts, `attempt limit ${this.options.maxAttempts} reached`);
        }

        const ticket = this.health.acquire(backend.id);
        if (!ticket) {
          const current = this.registry.getById(backend.id);
          attempts.push({
            backendId: backend.id,
            backendClass,
            outcome: current.health === 'open' ? 'circuit-open' : 'trial-in-progress',
            latencyMs: 0,
          });
          continue;
        }

        calls++;
        const result = await this.attempt(request, backend, ticket, attempts, signal);
        if (result) {
          return {
            response: result,
            decision: {
              backendId: backend.id,
              backendClass,
              attempts,
              rationale: this.rationale(preference, backendClass, attempts),
            },
          };
        }
      }
    }

    throw this.exhausted(request, attempts, calls === 0
      ? 'every candidate circuit is open'
      : 'every candidate failed');
  }

  /** One backend call; resolves to undefined when the caller should fall back. */
  private async attempt(
    request: DispatchRequest,
    backend: ModelBackend,
    ticket: HealthTicket,
    attempts: AttemptRecord[],
    signal: AbortSignal | undefined,
  ): Promise<BackendResponse | undefined> {
    const startMs = performance.now();
    try {
      const response = await this.client.generate(backend, request.prompt, {
        timeoutMs: this.options.timeoutMs,
        signal,
      });
      this.health.recordSuccess(ticket);
      attempts.push({
        backendId: backend.id,
        backendClass: backend.backendClass,
        outcome: 'success',
        latencyMs: response.latencyMs,
      });
      return response;
    } catch (err) {
      const latencyMs = Math.round(performance.now() - startMs);
      if (err instanceof CallAbortedError || signal?.aborted) {
        this.health.release(ticket);
        throw new RequestCancelledError(attempts);
      }
      const { outcome, detail } = describeFailure(err);
      this.health.recordFailure(ticket);
      attempts.push({ backendId: backend.id, backendClass: backend.backendClass, outcome, latencyMs, detail });
      log.warn(`Request ${request.id}: ${backend.id} ${outcome} after ${latencyMs}ms, falling back`);
      return undefined;
    }
  }

  private rationale(preference: BackendClass[], served: BackendClass, attempts: AttemptRecord[]): string {
    const order = preference.join(' > ');
    if (attempts.length === 1) {
      return `Preference ${order}: served by first candidate (${served})`;
    }
    const failed = attempts
      .slice(0, -1)
      .map(a => `${a.backendId}=${a.outcome}`)
      .join(', ');
    return `Preference ${order}: fell back to ${served} after ${failed}`;
  }

  private exhausted(request: DispatchRequest, attempts: AttemptRecord[], reason: string): AllBackendsUnavailableError {
    log.error(`Request ${request.id}: ${reason} (${attempts.length} attempts)`);
    return new AllBackendsUnavailableError(attempts, reason);
  }
}
