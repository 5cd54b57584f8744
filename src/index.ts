#!/usr/bin/env node
/**
 * @fileoverview Entry point: registers services and serves MCP over stdio.
 * @module src/index
 */
import 'reflect-metadata';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { config } from '@/config/index.js';
import { registerMotifServices } from '@/container/index.js';
import { createMcpServer } from '@/mcp-server/server.js';
import { logger, requestContextService } from '@/utils/index.js';

async function main(): Promise<void> {
  const context = requestContextService.createRequestContext({
    operation: 'ServerStartup',
  });

  registerMotifServices();
  const server = createMcpServer();
  const transport = new StdioServerTransport();

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`, context);
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { ...context, error });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(transport);
  logger.info(`${config.serverName} v${config.serverVersion} listening on stdio`, {
    ...context,
    cacheDir: config.cacheDir,
    dataDir: config.dataDir,
    defaultSourceMode: config.defaultSourceMode,
  });
}

main().catch((error: unknown) => {
  logger.crit('Server failed to start', { error });
  process.exit(1);
});
