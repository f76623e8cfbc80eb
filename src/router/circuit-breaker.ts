import type { BreakerOptions } from '../config/types.js';
import type { HealthState } from './types.js';

export interface BreakerSnapshot {
  state: HealthState;
  /** Bumped on every state change; a call's result only counts in the generation it was granted in. */
  generation: number;
  consecutiveFailures: number;
  /** Epoch ms when the breaker last opened; 0 while it has never opened. */
  openedAt: number;
  /** Current cool-down; grows with backoff on failed trials. */
  cooldownMs: number;
  trialInFlight: boolean;
}

export type FailureSource = 'dispatch' | 'probe';

/** Handed out with each granted call; settles the outcome of that call only. */
export interface BreakerTicket {
  readonly generation: number;
}

export type BreakerEvent =
  | { type: 'success'; generation: number }
  | { type: 'failure'; source: FailureSource; at: number; generation: number }
  | { type: 'cooldown-check'; at: number }
  | { type: 'trial-start' }
  | { type: 'trial-abandoned'; generation: number };

export function initialSnapshot(options: BreakerOptions): BreakerSnapshot {
  return {
    state: 'closed',
    generation: 0,
    consecutiveFailures: 0,
    openedAt: 0,
    cooldownMs: options.cooldownMs,
    trialInFlight: false,
  };
}

function open(snapshot: BreakerSnapshot, at: number, cooldownMs: number): BreakerSnapshot {
  return {
    state: 'open',
    generation: snapshot.generation + 1,
    consecutiveFailures: snapshot.consecutiveFailures,
    openedAt: at,
    cooldownMs,
    trialInFlight: false,
  };
}

/**
 * Pure transition function of the closed / open / half-open machine.
 * Events that make no sense in the current state, and outcomes of calls
 * granted in an earlier generation, return the snapshot unchanged.
 */
export function transition(
  snapshot: BreakerSnapshot,
  event: BreakerEvent,
  options: BreakerOptions,
): BreakerSnapshot {
  if ('generation' in event && event.generation !== snapshot.generation) {
    return snapshot;
  }

  switch (snapshot.state) {
    case 'closed':
      if (event.type === 'success') {
        return snapshot.consecutiveFailures === 0
          ? snapshot
          : { ...snapshot, consecutiveFailures: 0 };
      }
      if (event.type === 'failure') {
        const failures = snapshot.consecutiveFailures + 1;
        if (event.source === 'probe' || failures >= options.failureThreshold) {
          return open({ ...snapshot, consecutiveFailures: failures }, event.at, options.cooldownMs);
        }
        return { ...snapshot, consecutiveFailures: failures };
      }
      return snapshot;

    case 'open':
      if (event.type === 'cooldown-check' && event.at - snapshot.openedAt >= snapshot.cooldownMs) {
        return { ...snapshot, state: 'half-open', generation: snapshot.generation + 1, trialInFlight: false };
      }
      return snapshot;

    case 'half-open':
      switch (event.type) {
        case 'trial-start':
          return snapshot.trialInFlight ? snapshot : { ...snapshot, trialInFlight: true };
        case 'trial-abandoned':
          return { ...snapshot, trialInFlight: false };
        case 'success':
          return {
            state: 'closed',
            generation: snapshot.generation + 1,
            consecutiveFailures: 0,
            openedAt: snapshot.openedAt,
            cooldownMs: options.cooldownMs,
            trialInFlight: false,
          };
        case 'failure': {
          const backedOff = Math.min(snapshot.cooldownMs * options.backoffMultiplier, options.maxCooldownMs);
          return open(
            { ...snapshot, consecutiveFailures: snapshot.consecutiveFailures + 1 },
            event.at,
            backedOff,
          );
        }
        default:
          return snapshot;
      }
  }
}

/**
 * Mutable holder around `transition` for one backend. Reports the state
 * change, if any, so the owner can publish it.
 */
export class CircuitBreaker {
  private current: BreakerSnapshot;

  constructor(private readonly options: BreakerOptions) {
    this.current = initialSnapshot(options);
  }

  get state(): HealthState {
    return this.current.state;
  }

  snapshot(): BreakerSnapshot {
    return { ...this.current };
  }

  /**
   * Move an expired open breaker to half-open.
   */
  poll(now = Date.now()): HealthState {
    this.apply({ type: 'cooldown-check', at: now });
    return this.current.state;
  }

  /**
   * Ask permission to send one request or probe. Closed always grants;
   * half-open grants exactly one trial until its outcome is recorded;
   * open never grants. Returns null when refused.
   */
  tryAcquire(now = Date.now()): BreakerTicket | null {
    this.poll(now);
    const ticket = { generation: this.current.generation };
    switch (this.current.state) {
      case 'closed':
        return ticket;
      case 'open':
        return null;
      case 'half-open':
        if (this.current.trialInFlight) return null;
        this.apply({ type: 'trial-start' });
        return ticket;
    }
  }

  recordSuccess(ticket: BreakerTicket): HealthState {
    this.apply({ type: 'success', generation: ticket.generation });
    return this.current.state;
  }

  recordFailure(ticket: BreakerTicket, source: FailureSource, now = Date.now()): HealthState {
    this.apply({ type: 'failure', source, at: now, generation: ticket.generation });
    return this.current.state;
  }

  /** Give back a half-open trial slot without an outcome. */
  release(ticket: BreakerTicket): void {
    this.apply({ type: 'trial-abandoned', generation: ticket.generation });
  }

  /** Milliseconds until an open breaker may be retried; 0 otherwise. */
  retryInMs(now = Date.now()): number {
    if (this.current.state !== 'open') return 0;
    return Math.max(0, this.current.openedAt + this.current.cooldownMs - now);
  }

  private apply(event: BreakerEvent): void {
    this.current = transition(this.current, event, this.options);
  }
}
