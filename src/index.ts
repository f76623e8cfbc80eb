#!/usr/bin/env node
import { parseArgs } from 'node:util';
import type http from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { configDir, loadConfig } from './config/index.js';
import { setLogLevel, createLogger } from './utils/logger.js';
import { BackendRegistry, resolveBackendSpecs } from './router/backend-registry.js';
import { HealthMonitor } from './router/health-monitor.js';
import { TierPolicyResolver, loadPolicyTable } from './router/policy.js';
import { TierRateLimiter } from './router/rate-limiter.js';
import { HttpBackendClient } from './proxy/client.js';
import { Dispatcher } from './proxy/dispatcher.js';
import { UsageLogWriter } from './logging/writer.js';
import { UsageLogReader } from './logging/reader.js';
import { UsageMetering } from './logging/metering.js';
import { loadWeights } from './classifier/engine.js';
import { RequestGateway } from './server/gateway.js';
import { registerTools } from './server/tools.js';

const log = createLogger('main');

const { values: flags } = parseArgs({
  options: {
    http: { type: 'boolean', default: false },
    'http-only': { type: 'boolean', default: false },
  },
  strict: false,
});

async function main(): Promise<void> {
  log.info('tierline starting...');

  // 1. Load configuration
  const config = loadConfig();
  setLogLevel(config.logging.level);
  log.info(`Configuration loaded from ${configDir}`);

  // 2. Backends and their health
  const registry = new BackendRegistry(resolveBackendSpecs(config));
  const client = new HttpBackendClient();
  const monitor = new HealthMonitor(registry, client, config.health);
  log.info(`Registered ${registry.getAll().length} backends`);

  // 3. Classifier weights and tier policy
  const weights = loadWeights(config.classifier.weightsPath);
  const policy = new TierPolicyResolver(loadPolicyTable(config.policyTablePath));

  // 4. Usage metering
  const usageWriter = new UsageLogWriter(config.logging.usageLogPath);
  const usageReader = new UsageLogReader(config.logging.usageLogPath);
  const metering = new UsageMetering(registry, config.pricing, usageWriter, config.metering.retainRecords);
  log.info(`Usage log: ${config.logging.usageLogPath}`);

  const gateway = new RequestGateway({
    weights,
    policy,
    dispatcher: new Dispatcher(registry, monitor, client, config.dispatch),
    metering,
    rateLimiter: new TierRateLimiter(config.rateLimits.requestsPerMinute, config.rateLimits.enabled),
  });

  monitor.start();

  // 5. Start HTTP proxy if enabled
  let httpServer: http.Server | null = null;
  const httpEnabled = config.http.enabled || flags.http === true || flags['http-only'] === true;
  if (httpEnabled) {
    const { createHttpProxy } = await import('./server/http-proxy.js');
    const server = createHttpProxy({ gateway, registry, monitor, metering, usageReader });
    server.listen(config.http.port, () => {
      log.info(`HTTP proxy listening on http://localhost:${config.http.port}`);
    });
    httpServer = server;
  }

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down`);
    monitor.stop();
    httpServer?.close();
    usageWriter.flush()
      .catch((err) => log.error('Failed to flush usage log', err))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  // 6. Start MCP stdio server (unless --http-only)
  if (flags['http-only'] !== true) {
    const server = new McpServer({
      name: 'tierline',
      version: '0.1.0',
    });

    registerTools(server, { gateway, registry, monitor, metering, usageReader });
    log.info('MCP tools registered');

    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.info('tierline is running on stdio transport');
  }
}

main().catch((err) => {
  log.error('Fatal error during startup', err);
  process.exit(1);
});
