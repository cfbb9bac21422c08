#!/usr/bin/env node
/**
 * dss-mcp server entry point.
 *
 * stdio (default): one caller, identified by DSS_API_KEY.
 * http: Streamable HTTP on HOST:PORT, each request identified by its
 * Authorization: Bearer <API key> header.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigError, loadConfig } from './config.js';
import { createClientFactory, staticIdentity } from './context.js';
import { startHttpServer } from './http.js';
import { createLogger } from './logger.js';
import { createMcpServer } from './server.js';
import { buildRegistry } from './tools/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: !config.production });
  const registry = buildRegistry();
  const clientFactory = createClientFactory({ dssUrl: config.dssUrl, pollIntervalMs: config.jobPollIntervalMs });

  logger.info({ transport: config.transport, dssUrl: config.dssUrl, tools: registry.size }, 'starting dss-mcp');

  if (config.transport === 'http') {
    startHttpServer({ registry, clientFactory, logger, host: config.host, port: config.port });
    return;
  }

  if (config.dssApiKey === undefined) {
    logger.warn('DSS_API_KEY is not set; every tool call will fail authentication');
  }
  const server = createMcpServer({ registry, identity: staticIdentity(config.dssApiKey), clientFactory, logger });
  await server.connect(new StdioServerTransport());
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    process.stderr.write(`${err.message}\n`);
  } else {
    process.stderr.write(`dss-mcp failed to start: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  }
  process.exit(1);
});
