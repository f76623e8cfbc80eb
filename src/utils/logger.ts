import winston from 'winston';
import type { LogLevel } from '../config/types.js';

const { combine, timestamp, printf, colorize } = winston.format;

// stdout belongs to the MCP stdio transport, so every level goes to stderr.
const root = winston.createLogger({
  level: 'info',
  format: combine(
    colorize(),
    timestamp({ format: 'HH:mm:ss.SSS' }),
    printf(({ level, message, timestamp: ts, scope, ...meta }) => {
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${String(ts)} ${level} [${String(scope)}] ${String(message)}${metaStr}`;
    }),
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

export interface Logger {
  debug(message: string, err?: unknown): void;
  info(message: string, err?: unknown): void;
  warn(message: string, err?: unknown): void;
  error(message: string, err?: unknown): void;
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
}

function describeError(err: unknown): Record<string, unknown> {
  if (err === undefined) return {};
  if (err instanceof Error) return { error: err.message };
  return { error: String(err) };
}

export function createLogger(scope: string): Logger {
  const child = root.child({ scope });
  return {
    debug: (message, err) => { child.debug(message, describeError(err)); },
    info: (message, err) => { child.info(message, describeError(err)); },
    warn: (message, err) => { child.warn(message, describeError(err)); },
    error: (message, err) => { child.error(message, describeError(err)); },
  };
}
