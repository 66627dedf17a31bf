/**
 * mcp-local-files - read-only MCP access to an allow-list of directories.
 *
 * @module mcp-local-files
 *
 * @description
 * Lists and reads files confined to explicitly allowed directories. Every
 * request path is canonicalized against the real filesystem (symlinks and
 * `..` included) before containment is checked, and size/extension limits
 * apply only once containment is proven.
 *
 * @example Basic Usage
 * ```typescript
 * import { loadConfig, createSandbox, createLocalFilesServer } from 'mcp-local-files';
 * import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
 *
 * const sandbox = createSandbox(loadConfig());
 * const server = createLocalFilesServer(sandbox);
 * await server.connect(new StdioServerTransport());
 * ```
 *
 * @example Core checks without the server
 * ```typescript
 * import { createSandbox, readContainedFile } from 'mcp-local-files';
 *
 * const sandbox = createSandbox({ ...config, allowedDirectories: ['/data'] });
 * const result = readContainedFile(sandbox, '/data/notes.txt');
 * ```
 */

export {
  createLocalFilesServer,
  SERVER_NAME,
  SERVER_VERSION
} from "./server.js";

export type { LocalFilesServerOptions } from "./server.js";

export {
  resolvePath,
  isContained,
  checkPolicy,
  classifyContent,
  Sandbox,
  createSandbox,
  NO_EXTENSION
} from "./security/index.js";

export type {
  ResolvedPath,
  AllowedRoot,
  PolicyConfig,
  ContentType,
  ContainedPath,
  RejectedDirectory
} from "./security/index.js";

export {
  DirectoryEnumerator,
  listAllowedFiles,
  readContainedFile
} from "./files/index.js";

export type {
  FileMetadata,
  DirectoryMetadata,
  DirectoryListing,
  FileContent,
  ListFilesResult
} from "./files/index.js";

export { loadConfig, ConfigurationError } from "./config/index.js";
export type { ServerConfig, LoadConfigOptions } from "./config/index.js";

export type { ToolResult, ConfigSnapshot } from "./tools/index.js";

// Re-export common types for consumers
export type {
  ErrorKind,
  AccessFailure,
  Outcome
} from "./types/index.js";

// Re-export type guards
export {
  isError,
  getErrorMessage
} from "./types/index.js";
