import { createHash } from 'node:crypto';

/**
 * Short, stable fingerprint of a prompt for usage records. The prompt text
 * itself is never written to the usage log.
 */
export function hashPrompt(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex').slice(0, 16);
}
