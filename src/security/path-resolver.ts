/**
 * Path Resolver
 *
 * Canonicalizes user-supplied path strings against the real filesystem:
 * - `.` and `..` segments
 * - symlinks at every level
 * - relative input only against an explicit base directory
 *
 * `realpathSync.native` is used because the JS `realpathSync` collapses
 * `..` lexically before following symlinks, unlike the kernel.
 *
 * Nothing downstream accepts a raw string; containment and policy checks
 * take the {@link ResolvedPath} produced here.
 */

import { isAbsolute, join, parse, resolve, sep } from 'path';
import { realpathSync } from 'fs';
import { fail, getErrorMessage, isNodeError, succeed, type Outcome } from '../types/index.js';

/**
 * A canonical, absolute, symlink-free path.
 *
 * Only the type is exported: instances come from {@link resolvePath} and
 * {@link resolveNearestAncestor}, and the private field keeps a plain
 * `{ path }` object from passing for one.
 */
class ResolvedPath {
  constructor(private readonly canonical: string) {}

  get path(): string {
    return this.canonical;
  }

  equals(other: ResolvedPath): boolean {
    return this.canonical === other.canonical;
  }

  toString(): string {
    return this.canonical;
  }
}

export type { ResolvedPath };

export const MAX_PATH_LENGTH = 4096;

const RELATIVE_PATH_MESSAGE = 'Relative paths are not accepted; provide an absolute path';

/**
 * Shape checks on a top-level request path, before the filesystem is
 * touched: non-empty, bounded, no NUL bytes, absolute.
 */
export function checkRequestPath(rawPath: string): Outcome<void> {
  const inputCheck = checkRawPath(rawPath);
  if (!inputCheck.ok) return inputCheck;

  if (!isAbsolute(rawPath)) {
    return fail('InvalidPath', RELATIVE_PATH_MESSAGE);
  }

  return succeed(undefined);
}

/**
 * Resolve `rawPath` to its canonical form.
 *
 * Relative input is only accepted together with `base`; at the top level
 * the resolver never guesses which directory was meant.
 */
export function resolvePath(rawPath: string, base?: ResolvedPath): Outcome<ResolvedPath> {
  const inputCheck = checkRawPath(rawPath);
  if (!inputCheck.ok) return inputCheck;

  let candidate: string;
  if (isAbsolute(rawPath)) {
    candidate = rawPath;
  } else if (base) {
    // Not join(): `..` must be applied by realpath, after symlinks
    candidate = base.path.endsWith(sep) ? base.path + rawPath : base.path + sep + rawPath;
  } else {
    return fail('InvalidPath', RELATIVE_PATH_MESSAGE);
  }

  try {
    return succeed(new ResolvedPath(realpathSync.native(candidate)));
  } catch (error) {
    if (isNodeError(error, 'ENOENT') || isNodeError(error, 'ENOTDIR')) {
      return fail('NotFound', 'Path does not exist');
    }
    if (isNodeError(error, 'ELOOP')) {
      return fail('InvalidPath', 'Too many levels of symbolic links');
    }
    if (isNodeError(error, 'ENAMETOOLONG')) {
      return fail('InvalidPath', 'Path name is too long');
    }
    return fail('IOError', `Failed to resolve path: ${getErrorMessage(error)}`);
  }
}

/**
 * Canonicalize `rawPath` one segment at a time and return the deepest
 * prefix that exists.
 *
 * Used after a failed resolution to find out where the failure happened.
 * Each step joins onto an already-real directory, so a `..` following a
 * symlink climbs out of the link target, as the kernel would.
 */
export function resolveNearestAncestor(rawPath: string): ResolvedPath | null {
  if (!checkRequestPath(rawPath).ok) return null;

  const root = parse(rawPath).root;
  let current: string;
  try {
    current = realpathSync.native(root);
  } catch {
    return null;
  }

  const segments = rawPath.slice(root.length).split(/[\\/]+/).filter((s) => s !== '' && s !== '.');
  for (const segment of segments) {
    try {
      current = realpathSync.native(join(current, segment));
    } catch {
      break;
    }
  }

  return new ResolvedPath(current);
}

/**
 * Express `target` relative to `root`, using `/` regardless of platform
 * separator. Returns `''` for the root itself.
 */
export function relativeTo(root: ResolvedPath, target: string): string {
  const prefix = root.path.endsWith(sep) ? root.path : root.path + sep;
  if (target === root.path) return '';
  const rest = target.startsWith(prefix) ? target.slice(prefix.length) : target;
  return rest.split(sep).join('/');
}

/**
 * Lexical absolute form of a configured directory, used before the
 * directory is handed to {@link resolvePath}.
 */
export function absoluteFrom(cwd: string, configured: string): string {
  return isAbsolute(configured) ? configured : resolve(cwd, configured);
}

function checkRawPath(rawPath: string): Outcome<void> {
  if (rawPath.length === 0) {
    return fail('InvalidPath', 'Path must not be empty');
  }

  if (rawPath.length > MAX_PATH_LENGTH) {
    return fail('InvalidPath', `Path exceeds maximum length of ${MAX_PATH_LENGTH} characters`);
  }

  // Null bytes truncate paths in some native calls
  if (rawPath.includes('\0')) {
    return fail('InvalidPath', 'Path contains null bytes');
  }

  return succeed(undefined);
}
