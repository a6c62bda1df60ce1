#!/usr/bin/env node
/**
 * MCP server entry point
 * Serves the parameter tools over stdio
 */

import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { runMcpServerStdio } from './modules/mcp/index.js';
import { makeIdentifierGenerator } from './modules/parameters/index.js';
import { makeMetabaseClient } from './modules/platform/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger (stderr; stdout carries the protocol)
  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info(
    { baseUrl: config.platform.baseUrl, authMode: config.platform.authMode },
    'Starting MCP server'
  );

  // Initialize dependencies
  const platform = makeMetabaseClient({
    baseUrl: config.platform.baseUrl,
    apiKey: config.platform.apiKey,
    username: config.platform.username,
    password: config.platform.password,
    timeoutMs: config.platform.timeoutMs,
    logger,
  });
  const ids = makeIdentifierGenerator();

  const server = await runMcpServerStdio({
    platform,
    ids,
    config: config.mcp,
    logger,
  });

  logger.info('MCP server connected on stdio');

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await server.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
