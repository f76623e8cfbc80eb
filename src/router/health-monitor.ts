import type { BreakerOptions } from '../config/types.js';
import type { BackendClient } from '../proxy/types.js';
import type { BackendRegistry } from './backend-registry.js';
import type { HealthState, ModelBackend } from './types.js';
import type { BreakerTicket } from './circuit-breaker.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('health-monitor');

/** Permission for one call to one backend, valid for the breaker generation it was granted in. */
export interface HealthTicket extends BreakerTicket {
  readonly backendId: string;
}

/**
 * What the request path may do to backend health. Every change goes
 * through the monitor, which then publishes it to the registry.
 */
export interface HealthReporter {
  /** Permission to call a backend now, or null. A granted half-open trial must be settled. */
  acquire(backendId: string): HealthTicket | null;
  recordSuccess(ticket: HealthTicket): void;
  recordFailure(ticket: HealthTicket): void;
  /** Abandon a granted call without an outcome (caller cancelled). */
  release(ticket: HealthTicket): void;
}

export interface HealthMonitorOptions {
  probeIntervalMs: number;
  probeTimeoutMs: number;
  breaker: BreakerOptions;
}

export interface BackendHealthStatus {
  id: string;
  state: HealthState;
  consecutiveFailures: number;
  cooldownMs: number;
  retryInMs: number;
}

/**
 * Periodic liveness prober and owner of one circuit breaker per backend.
 * Runs on its own timer; requests never wait on a probe.
 */
export class HealthMonitor implements HealthReporter {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private probeAbort = new AbortController();
  private ticking = false;

  constructor(
    private readonly registry: BackendRegistry,
    private readonly client: BackendClient,
    private readonly options: HealthMonitorOptions,
  ) {
    for (const backend of registry.getAll()) {
      this.breakers.set(backend.id, new CircuitBreaker(options.breaker));
    }
  }

  start(): void {
    if (this.timer) return;
    this.probeAbort = new AbortController();
    this.runTick();
    this.timer = setInterval(() => this.runTick(), this.options.probeIntervalMs);
    // Don't prevent process exit
    this.timer.unref();
    log.info(`Probing ${this.breakers.size} backends every ${this.options.probeIntervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.probeAbort.abort();
  }

  /**
   * One probe round: promote expired open breakers to half-open, then probe
   * every backend that may be called. Overlapping rounds are skipped.
   */
  async tick(now = Date.now()): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;
    try {
      const due: Array<{ backend: ModelBackend; ticket: BreakerTicket; trial: boolean }> = [];
      for (const backend of this.registry.getAll()) {
        const breaker = this.breaker(backend.id);
        const ticket = breaker.tryAcquire(now);
        if (ticket) {
          due.push({ backend, ticket, trial: breaker.state === 'half-open' });
        }
        this.publish(backend.id);
      }
      await Promise.all(due.map(({ backend, ticket, trial }) => this.probeOne(backend, ticket, trial)));
    } finally {
      this.ticking = false;
    }
  }

  acquire(backendId: string): HealthTicket | null {
    const ticket = this.breaker(backendId).tryAcquire();
    this.publish(backendId);
    return ticket ? { backendId, generation: ticket.generation } : null;
  }

  recordSuccess(ticket: HealthTicket): void {
    this.breaker(ticket.backendId).recordSuccess(ticket);
    this.publish(ticket.backendId);
  }

  recordFailure(ticket: HealthTicket): void {
    const breaker = this.breaker(ticket.backendId);
    const before = breaker.state;
    const after = breaker.recordFailure(ticket, 'dispatch');
    if (before !== 'open' && after === 'open') {
      log.warn(`Circuit opened for ${ticket.backendId} after dispatch failure (retry in ${breaker.retryInMs()}ms)`);
    }
    this.publish(ticket.backendId);
  }

  release(ticket: HealthTicket): void {
    this.breaker(ticket.backendId).release(ticket);
  }

  status(): BackendHealthStatus[] {
    return Array.from(this.breakers.entries()).map(([id, breaker]) => {
      const snap = breaker.snapshot();
      return {
        id,
        state: snap.state,
        consecutiveFailures: snap.consecutiveFailures,
        cooldownMs: snap.cooldownMs,
        retryInMs: breaker.retryInMs(),
      };
    });
  }

  private runTick(): void {
    this.tick().catch(err => log.error('Health probe round failed', err));
  }

  private async probeOne(backend: ModelBackend, ticket: BreakerTicket, trial: boolean): Promise<void> {
    const breaker = this.breaker(backend.id);
    try {
      await this.client.probe(backend, {
        timeoutMs: this.options.probeTimeoutMs,
        signal: this.probeAbort.signal,
      });
      // A passing probe on a closed breaker leaves its dispatch failure count alone.
      if (trial) {
        breaker.recordSuccess(ticket);
        log.info(`Backend ${backend.id} recovered (half-open probe succeeded)`);
      }
    } catch (err) {
      if (this.probeAbort.signal.aborted) {
        breaker.release(ticket);
        return;
      }
      breaker.recordFailure(ticket, 'probe');
      log.warn(`Probe failed for ${backend.id}`, err);
    }
    this.publish(backend.id);
  }

  private breaker(backendId: string): CircuitBreaker {
    const breaker = this.breakers.get(backendId);
    if (!breaker) {
      throw new Error(`Unknown backend ID: ${backendId}`);
    }
    return breaker;
  }

  private publish(backendId: string): void {
    this.registry.setHealth(backendId, this.breaker(backendId).state);
  }
}
