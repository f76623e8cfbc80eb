import { z } from 'zod';
import { BACKEND_CLASSES, CUSTOMER_TIERS } from '../router/types.js';

const tierNumbers = (min: number) => z.object({
  basic: z.number().min(min),
  premium: z.number().min(min),
  enterprise: z.number().min(min),
});

export const backendClassSchema = z.enum(BACKEND_CLASSES);
export const customerTierSchema = z.enum(CUSTOMER_TIERS);

export const backendSpecSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  backendClass: backendClassSchema,
  endpoint: z.object({
    kind: z.enum(['ollama', 'openai-compat']),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    apiKey: z.string().optional(),
  }),
  costPerRequest: z.number().min(0),
});

export const backendCatalogSchema = z.object({
  backends: z.array(backendSpecSchema),
});

export const configSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    usageLogPath: z.string(),
  }),
  classifier: z.object({
    weightsPath: z.string(),
  }),
  backendCatalogPath: z.string(),
  backends: z.array(backendSpecSchema),
  ollamaBaseUrl: z.string(),
  policyTablePath: z.string(),
  pricing: tierNumbers(0),
  rateLimits: z.object({
    enabled: z.boolean(),
    requestsPerMinute: tierNumbers(1),
  }),
  health: z.object({
    probeIntervalMs: z.number().int().positive(),
    probeTimeoutMs: z.number().int().positive(),
    breaker: z.object({
      failureThreshold: z.number().int().positive(),
      cooldownMs: z.number().int().positive(),
      backoffMultiplier: z.number().min(1),
      maxCooldownMs: z.number().int().positive(),
    }).refine(b => b.maxCooldownMs >= b.cooldownMs, {
      message: 'maxCooldownMs must be >= cooldownMs',
    }),
  }),
  dispatch: z.object({
    timeoutMs: z.number().int().positive(),
    maxAttempts: z.number().int().positive(),
  }),
  metering: z.object({
    retainRecords: z.number().int().min(0),
  }),
  http: z.object({
    port: z.number().int().min(0).max(65535),
    enabled: z.boolean(),
  }),
});

export function formatZodError(err: z.ZodError): string {
  return err.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
