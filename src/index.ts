#!/usr/bin/env node
import process from 'node:process';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { MenderClient } from './mender/client.js';
import { buildMcpServer } from './mcp/server.js';
import { maskToken, sanitizeMessage } from './security/redaction.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, { pretty: config.logPretty });

  const client = new MenderClient({
    serverUrl: config.serverUrl,
    accessToken: config.accessToken,
    timeoutMs: config.requestTimeoutMs,
    endpoints: config.deploymentLogEndpoints,
    logger
  });

  const server = buildMcpServer({ logger, client });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    {
      transport: 'stdio',
      serverUrl: config.serverUrl,
      tokenMasked: maskToken(config.accessToken)
    },
    'mcp-mender running on stdio'
  );

  const shutdown = () => {
    logger.info('Shutting down stdio server');
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ reason: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  const text = error instanceof Error ? error.message : String(error);
  console.error(`mcp-mender failed to start: ${sanitizeMessage(text)}`);
  process.exit(1);
});
