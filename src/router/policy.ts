import fs from 'node:fs';
import { z } from 'zod';
import type { BackendClass, PolicyTable, TierPolicy } from './types.js';
import { isCustomerTier } from './types.js';
import { InvalidTierError } from './errors.js';
import { backendClassSchema, formatZodError } from '../config/schema.js';

const classListSchema = z.array(backendClassSchema).min(1)
  .refine(list => new Set(list).size === list.length, { message: 'classes must not repeat' });

const tierEntrySchema = z.object({
  threshold: z.number().min(0).max(1),
  belowThreshold: classListSchema,
  atOrAboveThreshold: classListSchema,
});

const policyFileSchema = z.object({
  basic: tierEntrySchema,
  premium: tierEntrySchema,
  enterprise: tierEntrySchema,
}).refine(
  t => t.basic.threshold > t.premium.threshold && t.premium.threshold > t.enterprise.threshold,
  { message: 'thresholds must strictly decrease from basic to premium to enterprise' },
);

export const DEFAULT_POLICY_TABLE: PolicyTable = {
  basic: {
    tier: 'basic',
    threshold: 0.6,
    belowThreshold: ['lightweight'],
    atOrAboveThreshold: ['lightweight', 'heavyweight'],
  },
  premium: {
    tier: 'premium',
    threshold: 0.35,
    belowThreshold: ['lightweight', 'heavyweight'],
    atOrAboveThreshold: ['heavyweight', 'lightweight'],
  },
  enterprise: {
    tier: 'enterprise',
    threshold: 0,
    belowThreshold: ['heavyweight', 'lightweight'],
    atOrAboveThreshold: ['heavyweight', 'lightweight'],
  },
};

export function parsePolicyTable(raw: unknown): PolicyTable {
  const result = policyFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid tier policy table: ${formatZodError(result.error)}`);
  }
  const table = result.data;
  return {
    basic: { tier: 'basic', ...table.basic },
    premium: { tier: 'premium', ...table.premium },
    enterprise: { tier: 'enterprise', ...table.enterprise },
  };
}

export function loadPolicyTable(policyPath: string): PolicyTable {
  if (!policyPath || !fs.existsSync(policyPath)) {
    return DEFAULT_POLICY_TABLE;
  }
  return parsePolicyTable(JSON.parse(fs.readFileSync(policyPath, 'utf-8')));
}

/**
 * Maps (tier, complexity score) to the ordered list of backend classes to
 * try. A score at or above the tier's threshold selects the escalated list.
 */
export class TierPolicyResolver {
  constructor(private readonly table: PolicyTable = DEFAULT_POLICY_TABLE) {}

  resolve(tier: string, score: number): BackendClass[] {
    const policy = this.policyFor(tier);
    const list = score >= policy.threshold ? policy.atOrAboveThreshold : policy.belowThreshold;
    return [...list];
  }

  policyFor(tier: string): TierPolicy {
    if (!isCustomerTier(tier)) {
      throw new InvalidTierError(tier);
    }
    return this.table[tier];
  }
}
