import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import type { RouterConfig } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '..', '..');

const configDir = process.env['TIERLINE_CONFIG_DIR']
  ?? path.join(os.homedir(), '.config', 'tierline');

export const defaults: RouterConfig = {
  logging: {
    level: 'info',
    usageLogPath: path.join(configDir, 'usage.jsonl'),
  },
  classifier: {
    weightsPath: path.join(projectRoot, 'data', 'classifier-weights.json'),
  },
  backendCatalogPath: path.join(projectRoot, 'data', 'backends.json'),
  backends: [],
  ollamaBaseUrl: '',
  policyTablePath: path.join(projectRoot, 'data', 'tier-policies.json'),
  pricing: {
    basic: 0.01,
    premium: 0.05,
    enterprise: 0.20,
  },
  rateLimits: {
    enabled: true,
    requestsPerMinute: {
      basic: 30,
      premium: 120,
      enterprise: 600,
    },
  },
  health: {
    probeIntervalMs: 15_000,
    probeTimeoutMs: 2_000,
    breaker: {
      failureThreshold: 3,
      cooldownMs: 15_000,
      backoffMultiplier: 2,
      maxCooldownMs: 120_000,
    },
  },
  dispatch: {
    timeoutMs: 30_000,
    maxAttempts: 4,
  },
  metering: {
    retainRecords: 1_000,
  },
  http: {
    port: 8585,
    enabled: false,
  },
};

export { configDir };
