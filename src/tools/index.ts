/**
 * Tool exports
 */

export {
  LIST_FILES_TOOL,
  listFilesSchema,
  listFiles,
  type ListFilesArgs,
} from './list-files.js';

export {
  READ_FILE_TOOL,
  readFileSchema,
  readFile,
  type ReadFileArgs,
} from './read-file.js';

export {
  GET_CONFIG_TOOL,
  getConfigSchema,
  getConfig,
  describeSandbox,
  type GetConfigArgs,
  type ConfigSnapshot,
} from './get-config.js';

export {
  jsonResult,
  failureResult,
  runTool,
  type ToolResult,
  type ToolContext,
} from './tool-runner.js';
