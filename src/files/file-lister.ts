/**
 * File Lister
 *
 * The list operation: an optional target directory, validated like any
 * other request path, or every allowed root.
 */

import { statSync } from 'fs';
import { fail, getErrorMessage, succeed, type Outcome } from '../types/index.js';
import type { ResolvedPath } from '../security/path-resolver.js';
import type { Sandbox } from '../security/sandbox.js';
import { DirectoryEnumerator, type DirectoryListing } from './directory-enumerator.js';

export interface ListFilesRequest {
  directoryPath?: string;
  recursive?: boolean;
  signal?: AbortSignal;
}

export interface ListFilesResult {
  allowedDirectories: string[];
  directories: DirectoryListing[];
  totalDirectories: number;
}

export function listAllowedFiles(sandbox: Sandbox, request: ListFilesRequest = {}): Outcome<ListFilesResult> {
  const configured = sandbox.requireConfigured();
  if (!configured.ok) return configured;

  let target: ResolvedPath | null = null;
  if (request.directoryPath) {
    const contained = sandbox.resolveContained(request.directoryPath);
    if (!contained.ok) return contained;

    try {
      if (!statSync(contained.value.path.path).isDirectory()) {
        return fail('InvalidPath', 'Path is not a directory');
      }
    } catch (error) {
      return fail('IOError', `Failed to stat directory: ${getErrorMessage(error)}`);
    }

    target = contained.value.path;
  }

  const enumerator = new DirectoryEnumerator(sandbox);
  const directories = enumerator.enumerate(target, {
    recursive: request.recursive,
    signal: request.signal,
    deadline: Date.now() + sandbox.policy.listTimeoutMs,
  });

  return succeed({
    allowedDirectories: sandbox.roots.map((root) => root.path.path),
    directories,
    totalDirectories: directories.length,
  });
}
