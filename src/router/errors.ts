import type { AttemptRecord } from './types.js';

export type ErrorKind =
  | 'InvalidTier'
  | 'InvalidRequest'
  | 'RateLimited'
  | 'AllBackendsUnavailable'
  | 'Cancelled'
  | 'InternalError';

/**
 * Base for every error the gateway surfaces to its caller. The `kind` is
 * what ends up in the `error_kind` field of the response.
 */
export abstract class RoutingError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;
}

export class InvalidTierError extends RoutingError {
  readonly kind = 'InvalidTier';
  readonly retryable = false;
  readonly tier: string;

  constructor(tier: unknown) {
    super(`Unknown customer tier: ${JSON.stringify(tier)}`);
    this.name = 'InvalidTierError';
    this.tier = String(tier);
  }
}

export class InvalidRequestError extends RoutingError {
  readonly kind = 'InvalidRequest';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class RateLimitedError extends RoutingError {
  readonly kind = 'RateLimited';
  readonly retryable = true;
  readonly retryAfterMs: number;

  constructor(tier: string, retryAfterMs: number) {
    super(`Rate limit exceeded for tier ${tier}, retry in ${Math.ceil(retryAfterMs / 1000)}s`);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class AllBackendsUnavailableError extends RoutingError {
  readonly kind = 'AllBackendsUnavailable';
  readonly retryable = true;
  readonly attempts: AttemptRecord[];

  constructor(attempts: AttemptRecord[], reason: string) {
    super(`All backends unavailable: ${reason}`);
    this.name = 'AllBackendsUnavailableError';
    this.attempts = attempts;
  }
}

export class RequestCancelledError extends RoutingError {
  readonly kind = 'Cancelled';
  readonly retryable = true;
  readonly attempts: AttemptRecord[];

  constructor(attempts: AttemptRecord[]) {
    super('Request cancelled by caller');
    this.name = 'RequestCancelledError';
    this.attempts = attempts;
  }
}
