import fs from 'node:fs';
import { z } from 'zod';
import type { UsageRecord } from './types.js';
import { backendClassSchema, customerTierSchema } from '../config/schema.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('usage-reader');

const attemptSchema = z.object({
  backendId: z.string(),
  backendClass: backendClassSchema,
  outcome: z.enum(['success', 'timeout', 'rejected', 'circuit-open', 'trial-in-progress']),
  latencyMs: z.number(),
  detail: z.string().optional(),
});

const usageRecordSchema = z.object({
  requestId: z.string(),
  timestamp: z.string(),
  tier: customerTierSchema,
  promptHash: z.string(),
  score: z.number(),
  backendId: z.string().nullable(),
  backendClass: backendClassSchema.nullable(),
  attempts: z.array(attemptSchema),
  latencyMs: z.number(),
  cost: z.number(),
  price: z.number(),
  margin: z.number(),
  success: z.boolean(),
});

/** Reads the JSONL usage log. Lines that don't parse are skipped. */
export class UsageLogReader {
  constructor(private readonly logFilePath: string) {}

  readAll(): UsageRecord[] {
    if (!fs.existsSync(this.logFilePath)) return [];

    const records: UsageRecord[] = [];
    let skipped = 0;
    for (const line of fs.readFileSync(this.logFilePath, 'utf-8').split('\n')) {
      if (!line.trim()) continue;
      try {
        const parsed = usageRecordSchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          records.push(parsed.data);
        } else {
          skipped++;
        }
      } catch {
        skipped++;
      }
    }
    if (skipped > 0) {
      log.debug(`Skipped ${skipped} unreadable lines in ${this.logFilePath}`);
    }
    return records;
  }

  readSince(sinceIso: string): UsageRecord[] {
    return this.readAll().filter(r => r.timestamp >= sinceIso);
  }

  tail(limit: number): UsageRecord[] {
    return this.readAll().slice(-limit);
  }

  getEntryById(requestId: string): UsageRecord | undefined {
    return this.readAll().find(r => r.requestId === requestId);
  }
}
