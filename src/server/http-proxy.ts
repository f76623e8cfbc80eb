import http from 'node:http';
import type { HandlerDeps } from './http-handlers.js';
import {
  handleBackends,
  handleGenerate,
  handleHealth,
  handleStats,
  sendError,
} from './http-handlers.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http-proxy');

const MAX_BODY_BYTES = 1024 * 1024;

class BodyTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      // Over the limit: read to the end, keep nothing.
      if (size <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > MAX_BODY_BYTES) {
        reject(new BodyTooLargeError());
        return;
      }
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

async function route(req: http.IncomingMessage, res: http.ServerResponse, deps: HandlerDeps): Promise<void> {
  const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;

  if (req.method === 'GET' && pathname === '/health') {
    handleHealth(req, res, deps);
    return;
  }
  if (req.method === 'GET' && pathname === '/backends') {
    handleBackends(req, res, deps);
    return;
  }
  if (req.method === 'GET' && pathname === '/stats') {
    handleStats(req, res, deps);
    return;
  }
  if (req.method === 'POST' && pathname === '/v1/generate') {
    let body: unknown;
    try {
      body = JSON.parse(await readBody(req));
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        sendError(res, 413, 'InvalidRequest', err.message);
      } else {
        sendError(res, 400, 'InvalidRequest', 'Request body must be valid JSON');
      }
      return;
    }
    await handleGenerate(body, res, deps);
    return;
  }

  sendError(res, 404, 'InvalidRequest', `No route for ${req.method ?? 'GET'} ${pathname}`);
}

export function createHttpProxy(deps: HandlerDeps): http.Server {
  return http.createServer((req, res) => {
    route(req, res, deps).catch((err) => {
      log.error(`Unhandled error on ${req.method ?? ''} ${req.url ?? ''}`, err);
      if (!res.headersSent) {
        sendError(res, 500, 'InternalError', 'Internal server error');
      } else {
        res.end();
      }
    });
  });
}
