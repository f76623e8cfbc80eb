import fs from 'node:fs';
import path from 'node:path';
import type { RouterConfig } from './types.js';
import { defaults, configDir } from './defaults.js';
import { configSchema, formatZodError } from './schema.js';

const configFilePath = path.join(configDir, 'config.json');

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function deepMerge(base: object, override: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

export interface LoadConfigOptions {
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): RouterConfig {
  const filePath = options.filePath ?? configFilePath;
  const env = options.env ?? process.env;

  let fileConfig: Record<string, unknown> = {};
  if (fs.existsSync(filePath)) {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isPlainObject(parsed)) {
      throw new Error(`Config file ${filePath} must contain a JSON object`);
    }
    fileConfig = parsed;
  }

  const merged = deepMerge(defaults, fileConfig);
  applyEnvOverrides(merged, env);

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatZodError(result.error)}`);
  }
  return result.data;
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  const section = (key: string): Record<string, unknown> => {
    const existing = config[key];
    if (isPlainObject(existing)) return existing;
    const created: Record<string, unknown> = {};
    config[key] = created;
    return created;
  };

  if (env['TIERLINE_LOG_LEVEL']) {
    config['logging'] = { ...section('logging'), level: env['TIERLINE_LOG_LEVEL'] };
  }
  if (env['TIERLINE_HTTP_PORT']) {
    config['http'] = { ...section('http'), port: Number(env['TIERLINE_HTTP_PORT']) };
  }
  if (env['TIERLINE_DISPATCH_TIMEOUT_MS']) {
    config['dispatch'] = { ...section('dispatch'), timeoutMs: Number(env['TIERLINE_DISPATCH_TIMEOUT_MS']) };
  }
  if (env['TIERLINE_OLLAMA_URL']) {
    config['ollamaBaseUrl'] = env['TIERLINE_OLLAMA_URL'];
  }
  if (env['TIERLINE_USAGE_LOG']) {
    config['logging'] = { ...section('logging'), usageLogPath: env['TIERLINE_USAGE_LOG'] };
  }
}

export { configDir };
export type { RouterConfig, LogLevel, BreakerOptions } from './types.js';
