import fs from 'node:fs';
import path from 'node:path';
import type { UsageRecord, UsageSink } from './types.js';

/**
 * Appends usage records to a JSONL file, one record per line. Writes are
 * chained so lines never interleave.
 */
export class UsageLogWriter implements UsageSink {
  private queue: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(private readonly logFilePath: string) {}

  append(record: UsageRecord): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    const write = this.queue.then(() => this.write(line));
    // The chain continues past a failed write; the caller still sees the rejection.
    this.queue = write.catch(() => undefined);
    return write;
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.queue;
  }

  private async write(line: string): Promise<void> {
    if (!this.dirReady) {
      await fs.promises.mkdir(path.dirname(this.logFilePath), { recursive: true });
      this.dirReady = true;
    }
    await fs.promises.appendFile(this.logFilePath, line, 'utf-8');
  }
}
