import fs from 'node:fs';
import type { BackendClass, BackendSpec, HealthState, ModelBackend } from './types.js';
import type { RouterConfig } from '../config/types.js';
import { backendCatalogSchema, formatZodError } from '../config/schema.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('backend-registry');

export function loadBackendCatalog(catalogPath: string): BackendSpec[] {
  const raw: unknown = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
  const result = backendCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid backend catalog ${catalogPath}: ${formatZodError(result.error)}`);
  }
  return result.data.backends;
}

/**
 * Backends from inline config, or the catalog file when none are inline,
 * with the ollama base URL override applied.
 */
export function resolveBackendSpecs(config: RouterConfig): BackendSpec[] {
  const specs = config.backends.length > 0
    ? config.backends
    : loadBackendCatalog(config.backendCatalogPath);

  if (!config.ollamaBaseUrl) return specs;
  return specs.map(spec => spec.endpoint.kind === 'ollama'
    ? { ...spec, endpoint: { ...spec.endpoint, baseUrl: config.ollamaBaseUrl } }
    : spec);
}

function freeze(spec: BackendSpec, health: HealthState): ModelBackend {
  return Object.freeze({ ...spec, endpoint: Object.freeze({ ...spec.endpoint }), health });
}

/**
 * In-memory set of known backends. Entries are frozen; a health change
 * swaps the whole entry, so a reader holding a backend never sees it
 * change underneath it.
 */
export class BackendRegistry {
  private backends = new Map<string, ModelBackend>();

  constructor(specs: BackendSpec[]) {
    for (const spec of specs) {
      if (this.backends.has(spec.id)) {
        throw new Error(`Duplicate backend ID: ${spec.id}`);
      }
      if (!(spec.costPerRequest >= 0)) {
        throw new Error(`Backend ${spec.id} has invalid costPerRequest: ${spec.costPerRequest}`);
      }
      this.backends.set(spec.id, freeze(spec, 'closed'));
    }
    log.info(`Loaded ${this.backends.size} backends`);
  }

  /** Backends of one class, in configuration order. */
  get(backendClass: BackendClass): ModelBackend[] {
    return this.getAll().filter(b => b.backendClass === backendClass);
  }

  getById(id: string): ModelBackend {
    const backend = this.backends.get(id);
    if (!backend) {
      throw new Error(`Unknown backend ID: ${id}`);
    }
    return backend;
  }

  getAll(): ModelBackend[] {
    return Array.from(this.backends.values());
  }

  setHealth(id: string, health: HealthState): void {
    const current = this.getById(id);
    if (current.health === health) return;
    this.backends.set(id, freeze(current, health));
    log.info(`Backend ${id}: ${current.health} -> ${health}`);
  }

  snapshot(): ModelBackend[] {
    return this.getAll();
  }

  countByHealth(): Record<HealthState, number> {
    const counts: Record<HealthState, number> = { 'closed': 0, 'open': 0, 'half-open': 0 };
    for (const backend of this.backends.values()) {
      counts[backend.health]++;
    }
    return counts;
  }
}
