/**
 * List Files Tool
 *
 * Lists files in one allowed directory, or in every allowed root:
 * - one directory level per call unless `recursive` is set
 * - restricted files listed with `readable: false`
 * - per-root failures reported without failing the call
 */

import { z } from 'zod';
import { listAllowedFiles } from '../files/index.js';
import { runTool, type ToolContext, type ToolResult } from './tool-runner.js';

export const LIST_FILES_TOOL = 'lf_list_files';

export const listFilesSchema = z.object({
  directoryPath: z
    .string()
    .max(4096)
    .optional()
    .describe('Absolute path of a directory inside an allowed directory. Omit to list every allowed directory.'),
  recursive: z
    .boolean()
    .optional()
    .describe('Also list subdirectories, up to the configured depth'),
});

export type ListFilesArgs = z.infer<typeof listFilesSchema>;

export function listFiles(args: ListFilesArgs, context: ToolContext): ToolResult {
  return runTool(LIST_FILES_TOOL, args, args.directoryPath, context, () =>
    listAllowedFiles(context.sandbox, {
      directoryPath: args.directoryPath,
      recursive: args.recursive,
      signal: context.signal,
    })
  );
}
