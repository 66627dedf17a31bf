/**
 * Read File Tool
 *
 * Returns the whole content of a file inside an allowed directory, as text
 * when it is valid UTF-8 and as base64 otherwise. Size and extension
 * limits apply here, not to listings.
 */

import { z } from 'zod';
import { readContainedFile } from '../files/index.js';
import { runTool, type ToolContext, type ToolResult } from './tool-runner.js';

export const READ_FILE_TOOL = 'lf_read_file';

export const readFileSchema = z.object({
  filePath: z
    .string()
    .min(1)
    .max(4096)
    .describe('Absolute path of the file to read'),
});

export type ReadFileArgs = z.infer<typeof readFileSchema>;

export function readFile(args: ReadFileArgs, context: ToolContext): ToolResult {
  return runTool(READ_FILE_TOOL, args, args.filePath, context, () =>
    readContainedFile(context.sandbox, args.filePath)
  );
}
