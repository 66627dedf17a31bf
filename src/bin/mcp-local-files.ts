#!/usr/bin/env node
/**
 * stdio entry point.
 *
 * Usage:
 *   ALLOWED_DIRECTORIES=/path/to/dir1,/path/to/dir2 mcp-local-files
 *
 * or put the same keys in a `.env` file in the working directory.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../config/index.js';
import { createSandbox } from '../security/index.js';
import { createLocalFilesServer } from '../server.js';
import { createLogger } from '../utils/index.js';
import { getErrorMessage } from '../types/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  logger.info('Starting local files MCP server');
  const sandbox = createSandbox(config, { logger });
  if (!sandbox.isConfigured) {
    logger.warn('Set ALLOWED_DIRECTORIES, e.g. ALLOWED_DIRECTORIES=/path/to/dir1,/path/to/dir2');
  }

  const server = createLocalFilesServer(sandbox, { logger });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', { error: getErrorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(new StdioServerTransport());
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${getErrorMessage(error)}`);
  process.exit(1);
});
