/**
 * Sandbox
 *
 * The immutable set of allowed roots and the policy snapshot, built once
 * at startup and shared read-only by every request.
 */

import { statSync } from 'fs';
import { ACCESS_DENIED_MESSAGE, fail, getErrorMessage, succeed, type Outcome } from '../types/index.js';
import type { ServerConfig } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';
import {
  absoluteFrom,
  checkRequestPath,
  resolveNearestAncestor,
  resolvePath,
  type ResolvedPath,
} from './path-resolver.js';
import { isContained, type AllowedRoot } from './containment.js';
import type { PolicyConfig } from './policy-filter.js';

export interface RejectedDirectory {
  configured: string;
  reason: string;
}

export interface ContainedPath {
  path: ResolvedPath;
  root: AllowedRoot;
}

export interface SandboxOptions {
  /** Base for relative configured directories; defaults to `process.cwd()` */
  cwd?: string;
  logger?: Logger;
}

export class Sandbox {
  constructor(
    readonly configuredDirectories: readonly string[],
    readonly roots: readonly AllowedRoot[],
    readonly rejected: readonly RejectedDirectory[],
    readonly policy: PolicyConfig
  ) {
    Object.freeze(this);
  }

  get isConfigured(): boolean {
    return this.roots.length > 0;
  }

  /**
   * `NotConfigured` unless at least one usable root exists.
   */
  requireConfigured(): Outcome<void> {
    if (this.isConfigured) return succeed(undefined);

    if (this.configuredDirectories.length === 0) {
      return fail(
        'NotConfigured',
        'No allowed directories configured. Set ALLOWED_DIRECTORIES in the environment or a .env file.'
      );
    }

    return fail(
      'NotConfigured',
      'No usable allowed directories: every configured directory was rejected at startup'
    );
  }

  /**
   * Resolve a request path and attribute it to an allowed root.
   *
   * Only malformed input is answered before the filesystem is consulted.
   * Any resolution failure (missing, symlink loop, name too long) is
   * answered by where the deepest existing ancestor lies: outside every
   * root the caller only learns `NotAllowed`, so nothing about the
   * filesystem outside the sandbox is revealed.
   */
  resolveContained(rawPath: string): Outcome<ContainedPath> {
    const input = checkRequestPath(rawPath);
    if (!input.ok) return input;

    const resolved = resolvePath(rawPath);

    if (!resolved.ok) {
      const ancestor = resolveNearestAncestor(rawPath);
      if (ancestor === null || !isContained(ancestor, this.roots).ok) {
        return fail('NotAllowed', ACCESS_DENIED_MESSAGE);
      }
      return resolved;
    }

    const root = isContained(resolved.value, this.roots);
    if (!root.ok) return root;

    return succeed({ path: resolved.value, root: root.value });
  }
}

/**
 * Canonicalize the configured directories and freeze the policy.
 *
 * Directories that do not exist, are not directories, or duplicate an
 * earlier root are rejected and reported, not fatal.
 */
export function createSandbox(config: ServerConfig, options: SandboxOptions = {}): Sandbox {
  const { cwd = process.cwd(), logger } = options;
  const roots: AllowedRoot[] = [];
  const rejected: RejectedDirectory[] = [];

  for (const configured of config.allowedDirectories) {
    const reason = admitRoot(configured, cwd, roots);
    if (reason !== null) {
      rejected.push({ configured, reason });
      logger?.warn(`Allowed directory rejected: ${configured}`, { reason });
    }
  }

  if (roots.length === 0) {
    logger?.warn('No usable allowed directories; list and read requests will fail');
  } else {
    logger?.info('Allowed directories', { directories: roots.map((root) => root.path.path) });
  }

  const policy: PolicyConfig = Object.freeze({
    maxFileSizeBytes: config.maxFileSizeBytes,
    allowedExtensions: new Set(config.allowedExtensions),
    maxListDepth: config.maxListDepth,
    maxListEntries: config.maxListEntries,
    listTimeoutMs: config.listTimeoutMs,
  });

  return new Sandbox(
    Object.freeze([...config.allowedDirectories]),
    Object.freeze(roots),
    Object.freeze(rejected),
    policy
  );
}

/** Pushes onto `roots` and returns `null`, or returns why it was rejected. */
function admitRoot(configured: string, cwd: string, roots: AllowedRoot[]): string | null {
  const resolved = resolvePath(absoluteFrom(cwd, configured));
  if (!resolved.ok) return resolved.failure.message;
  const path = resolved.value;

  try {
    if (!statSync(path.path).isDirectory()) {
      return 'Path is not a directory';
    }
  } catch (error) {
    return getErrorMessage(error);
  }

  const duplicate = roots.find((root) => root.path.equals(path));
  if (duplicate) {
    return `Same directory as ${duplicate.configured}`;
  }

  roots.push(Object.freeze({ configured, path, index: roots.length }));
  return null;
}
