import type { BackendSpec, CustomerTier } from '../router/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface BreakerOptions {
  /** Consecutive dispatch failures that open a closed breaker. */
  failureThreshold: number;
  cooldownMs: number;
  backoffMultiplier: number;
  maxCooldownMs: number;
}

export interface RouterConfig {
  logging: {
    level: LogLevel;
    usageLogPath: string;
  };

  classifier: {
    weightsPath: string;
  };

  backendCatalogPath: string;
  /** Inline backends take precedence over the catalog file when non-empty. */
  backends: BackendSpec[];
  /** When set, replaces the base URL of every ollama backend. */
  ollamaBaseUrl: string;

  policyTablePath: string;

  pricing: Record<CustomerTier, number>;

  rateLimits: {
    enabled: boolean;
    requestsPerMinute: Record<CustomerTier, number>;
  };

  health: {
    probeIntervalMs: number;
    probeTimeoutMs: number;
    breaker: BreakerOptions;
  };

  dispatch: {
    timeoutMs: number;
    maxAttempts: number;
  };

  metering: {
    retainRecords: number;
  };

  http: {
    port: number;
    enabled: boolean;
  };
}
