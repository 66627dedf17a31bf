/**
 * MCP server wiring: the three file tools on an `McpServer`.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Sandbox } from './security/sandbox.js';
import { createLogger, type Logger } from './utils/logger.js';
import {
  GET_CONFIG_TOOL,
  LIST_FILES_TOOL,
  READ_FILE_TOOL,
  getConfig,
  listFiles,
  listFilesSchema,
  readFile,
  readFileSchema,
} from './tools/index.js';

export const SERVER_NAME = 'mcp-local-files';
export const SERVER_VERSION = '1.0.0';

export interface LocalFilesServerOptions {
  name?: string;
  version?: string;
  logger?: Logger;
}

export function createLocalFilesServer(
  sandbox: Sandbox,
  options: LocalFilesServerOptions = {}
): McpServer {
  const { name = SERVER_NAME, version = SERVER_VERSION, logger = createLogger() } = options;
  const server = new McpServer({ name, version });

  server.tool(
    LIST_FILES_TOOL,
    'List files in the allowed directories, or in one directory inside them. ' +
      'Lists one level per call unless recursive is set.',
    listFilesSchema.shape,
    async (args, extra) => listFiles(args, { sandbox, logger, signal: extra.signal })
  );

  server.tool(
    READ_FILE_TOOL,
    'Read a file inside the allowed directories. Text is returned as-is, binary content as base64.',
    readFileSchema.shape,
    async (args, extra) => readFile(args, { sandbox, logger, signal: extra.signal })
  );

  server.tool(
    GET_CONFIG_TOOL,
    'Show the allowed directories, size limit and extension allow-list in effect.',
    async () => getConfig({}, { sandbox, logger })
  );

  return server;
}
