/**
 * Containment Checker
 *
 * Decides whether a canonical path lies inside one of the allowed roots.
 * A path is inside a root when it equals the root or starts with the root
 * followed by a path separator: `/home/user2` is not inside `/home/user`.
 */

import { sep } from 'path';
import { ACCESS_DENIED_MESSAGE, fail, succeed, type Outcome } from '../types/index.js';
import type { ResolvedPath } from './path-resolver.js';

export interface AllowedRoot {
  /** Directory string as it appeared in configuration */
  readonly configured: string;
  /** Canonical form established at startup */
  readonly path: ResolvedPath;
  /** Position in configured order */
  readonly index: number;
}

export function isWithinRoot(resolved: ResolvedPath, root: ResolvedPath): boolean {
  if (resolved.path === root.path) return true;
  const prefix = root.path.endsWith(sep) ? root.path : root.path + sep;
  return resolved.path.startsWith(prefix);
}

/**
 * Attribute `resolved` to the most specific root containing it.
 *
 * Roots may nest; the longest matching root wins, and equal roots go to
 * the one configured first.
 */
export function isContained(
  resolved: ResolvedPath,
  roots: readonly AllowedRoot[]
): Outcome<AllowedRoot> {
  let match: AllowedRoot | undefined;

  for (const root of roots) {
    if (!isWithinRoot(resolved, root.path)) continue;
    if (match === undefined || root.path.path.length > match.path.path.length) {
      match = root;
    }
  }

  if (match === undefined) {
    return fail('NotAllowed', ACCESS_DENIED_MESSAGE);
  }

  return succeed(match);
}
