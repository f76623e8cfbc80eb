import crypto from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { ComplexityHint, ComplexityScore, FeatureWeights } from '../classifier/types.js';
import type { TierPolicyResolver } from '../router/policy.js';
import type { TierRateLimiter } from '../router/rate-limiter.js';
import type { Dispatcher } from '../proxy/dispatcher.js';
import type { UsageMetering } from '../logging/metering.js';
import type { BackendClass, CustomerTier } from '../router/types.js';
import type { ErrorKind } from '../router/errors.js';
import { scoreRequest } from '../classifier/engine.js';
import { isCustomerTier } from '../router/types.js';
import {
  AllBackendsUnavailableError,
  InvalidRequestError,
  InvalidTierError,
  RateLimitedError,
  RoutingError,
} from '../router/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('gateway');

export interface GatewayInput {
  prompt: string;
  customer_tier: string;
  complexity_hint?: ComplexityHint;
}

export interface GatewaySuccess {
  status: 'success';
  request_id: string;
  text: string;
  model_used: string;
  latency_ms: number;
  cost: number;
}

export interface GatewayFailure {
  status: 'error';
  request_id: string;
  error_kind: ErrorKind;
  message: string;
  retryable: boolean;
}

export type GatewayResult = GatewaySuccess | GatewayFailure;

export interface GatewayDeps {
  weights: FeatureWeights;
  policy: TierPolicyResolver;
  dispatcher: Dispatcher;
  metering: UsageMetering;
  rateLimiter?: TierRateLimiter;
}

export interface RoutePreview {
  score: ComplexityScore;
  preference: Record<CustomerTier, BackendClass[]>;
}

/**
 * Single entry point for one generation request: validate, classify,
 * resolve policy, dispatch with fallback, meter. Always resolves to a
 * structured result; nothing thrown inside reaches the caller.
 */
export class RequestGateway {
  constructor(private readonly deps: GatewayDeps) {}

  async handle(input: GatewayInput, signal?: AbortSignal): Promise<GatewayResult> {
    const requestId = crypto.randomUUID();
    const startMs = performance.now();

    try {
      return await this.route(requestId, input, startMs, signal);
    } catch (err) {
      if (err instanceof RoutingError) {
        log.info(`Request ${requestId}: ${err.kind}: ${err.message}`);
        return failure(requestId, err.kind, err.message, err.retryable);
      }
      log.error(`Request ${requestId}: unexpected failure`, err);
      return failure(requestId, 'InternalError', 'Internal routing error', true);
    }
  }

  /** Score and per-tier preference lists for a prompt, without dispatching. */
  preview(prompt: string, complexityHint?: ComplexityHint): RoutePreview {
    const score = scoreRequest({ prompt, complexityHint }, this.deps.weights);
    const { policy } = this.deps;
    return {
      score,
      preference: {
        basic: policy.resolve('basic', score.value),
        premium: policy.resolve('premium', score.value),
        enterprise: policy.resolve('enterprise', score.value),
      },
    };
  }

  private async route(
    requestId: string,
    input: GatewayInput,
    startMs: number,
    signal: AbortSignal | undefined,
  ): Promise<GatewayResult> {
    const { weights, policy, dispatcher, metering, rateLimiter } = this.deps;

    const tier = input.customer_tier;
    if (!isCustomerTier(tier)) {
      throw new InvalidTierError(tier);
    }
    if (typeof input.prompt !== 'string' || input.prompt.trim().length === 0) {
      throw new InvalidRequestError('prompt must be a non-empty string');
    }

    if (rateLimiter) {
      const slot = rateLimiter.tryAcquire(tier);
      if (!slot.allowed) {
        throw new RateLimitedError(tier, slot.retryAfterMs);
      }
    }

    const score = scoreRequest({ prompt: input.prompt, complexityHint: input.complexity_hint }, weights);
    const preference = policy.resolve(tier, score.value);
    const metered = { id: requestId, prompt: input.prompt, tier, score: score.value };

    log.debug(`Request ${requestId}: tier=${tier} score=${score.value.toFixed(3)} preference=${preference.join(',')}`);

    try {
      const { decision, response } = await dispatcher.dispatch(
        { id: requestId, prompt: input.prompt },
        preference,
        signal,
      );
      const latencyMs = Math.round(performance.now() - startMs);
      const record = metering.record(metered, { decision }, latencyMs, true);

      log.info(`Request ${requestId}: ${tier} -> ${decision.backendId} in ${latencyMs}ms (${decision.attempts.length} attempts)`);

      return {
        status: 'success',
        request_id: requestId,
        text: response.text,
        model_used: decision.backendId,
        latency_ms: latencyMs,
        cost: record.cost,
      };
    } catch (err) {
      if (err instanceof AllBackendsUnavailableError) {
        const latencyMs = Math.round(performance.now() - startMs);
        metering.record(metered, { decision: null, attempts: err.attempts }, latencyMs, false);
      }
      throw err;
    }
  }
}

function failure(requestId: string, kind: ErrorKind, message: string, retryable: boolean): GatewayFailure {
  return { status: 'error', request_id: requestId, error_kind: kind, message, retryable };
}
