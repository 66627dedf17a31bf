/**
 * File Reader
 *
 * Reads a whole file once it has passed containment and the read policy.
 * Valid UTF-8 comes back as text, anything else as base64.
 */

import { basename, extname } from 'path';
import { readFileSync, statSync, type Stats } from 'fs';
import { fail, getErrorMessage, isNodeError, succeed, type Outcome } from '../types/index.js';
import { checkPolicy, classifyContent, type ContentType } from '../security/policy-filter.js';
import type { Sandbox } from '../security/sandbox.js';

export interface FileContent {
  filePath: string;
  name: string;
  size: number;
  modified: string;
  extension: string;
  contentType: ContentType;
  encoding: 'utf-8' | 'base64';
  content: string;
}

export function readContainedFile(sandbox: Sandbox, rawPath: string): Outcome<FileContent> {
  const configured = sandbox.requireConfigured();
  if (!configured.ok) return configured;

  const contained = sandbox.resolveContained(rawPath);
  if (!contained.ok) return contained;

  const filePath = contained.value.path.path;

  let stats: Stats;
  try {
    stats = statSync(filePath);
  } catch (error) {
    return ioFailure(error);
  }

  if (!stats.isFile()) {
    return fail('InvalidPath', 'Path is not a file');
  }

  const policy = checkPolicy(contained.value.path, stats, sandbox.policy);
  if (!policy.ok) return policy;

  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error) {
    return ioFailure(error);
  }

  // The file may have grown since it was stat'ed
  if (bytes.length > sandbox.policy.maxFileSizeBytes) {
    return fail(
      'FileTooLarge',
      `File size ${bytes.length} bytes exceeds the limit of ${sandbox.policy.maxFileSizeBytes} bytes`
    );
  }

  const contentType = classifyContent(bytes);

  const file: FileContent = {
    filePath,
    name: basename(filePath),
    size: bytes.length,
    modified: stats.mtime.toISOString(),
    extension: extname(filePath),
    contentType,
    encoding: contentType === 'text' ? 'utf-8' : 'base64',
    content: contentType === 'text' ? bytes.toString('utf8') : bytes.toString('base64'),
  };

  return succeed(file);
}

function ioFailure(error: unknown): Outcome<never> {
  if (isNodeError(error, 'ENOENT')) {
    return fail('NotFound', 'File no longer exists');
  }
  return fail('IOError', `Error reading file: ${getErrorMessage(error)}`);
}
