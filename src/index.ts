#!/usr/bin/env node

import { config as loadEnv } from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getHealthStatus, loadConfig } from './config.js';
import { createGateway } from './gateway.js';
import { createLogger } from './logger.js';
import { createMcpServer } from './server.js';

loadEnv();

async function main() {
  const config = loadConfig();
  const log = createLogger({ level: config.logLevel });

  const health = getHealthStatus(config);
  if (health.status !== 'ready') {
    log.error('TickTick credentials are not configured', { missing: health.missing });
    process.exit(1);
  }

  const gateway = createGateway(config, { logger: log });
  const server = createMcpServer(gateway.dispatcher);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('TickTick gateway started', {
    tools: gateway.dispatcher.list().length,
    timeZone: config.timeZone,
    requestDelayMs: config.requestDelayMs,
  });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(JSON.stringify({ level: 'error', msg: `Failed to start: ${message}`, ts: new Date().toISOString() }));
  process.exit(1);
});
