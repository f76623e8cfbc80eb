export const CUSTOMER_TIERS = ['basic', 'premium', 'enterprise'] as const;
export type CustomerTier = typeof CUSTOMER_TIERS[number];

export const BACKEND_CLASSES = ['lightweight', 'heavyweight'] as const;
export type BackendClass = typeof BACKEND_CLASSES[number];

export type HealthState = 'closed' | 'open' | 'half-open';

export type BackendKind = 'ollama' | 'openai-compat';

export interface EndpointDescriptor {
  kind: BackendKind;
  baseUrl: string;
  model: string;
  apiKey?: string;
}

export interface BackendSpec {
  id: string;
  displayName: string;
  backendClass: BackendClass;
  endpoint: EndpointDescriptor;
  costPerRequest: number;
}

export interface ModelBackend extends BackendSpec {
  readonly health: HealthState;
}

export interface TierPolicy {
  tier: CustomerTier;
  threshold: number;
  belowThreshold: BackendClass[];
  atOrAboveThreshold: BackendClass[];
}

export type PolicyTable = Record<CustomerTier, TierPolicy>;

export type AttemptOutcome =
  | 'success'
  | 'timeout'
  | 'rejected'
  | 'circuit-open'
  | 'trial-in-progress';

export interface AttemptRecord {
  backendId: string;
  backendClass: BackendClass;
  outcome: AttemptOutcome;
  latencyMs: number;
  detail?: string;
}

export interface RoutingDecision {
  backendId: string;
  backendClass: BackendClass;
  attempts: AttemptRecord[];
  rationale: string;
}

export function isCustomerTier(value: unknown): value is CustomerTier {
  return typeof value === 'string' && CUSTOMER_TIERS.some(tier => tier === value);
}
