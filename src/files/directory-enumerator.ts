/**
 * Directory Enumerator
 *
 * Lists allowed roots, or a validated directory inside one, producing
 * file metadata. Every entry is resolved and checked for containment on
 * its own, so a symlink inside a root that points elsewhere never shows.
 *
 * Listing and reading are separate gates: contained files are always
 * listed, and the read policy only marks them `readable: false`.
 */

import { extname, join } from 'path';
import { readdirSync, statSync, type Stats } from 'fs';
import {
  fail,
  getErrorMessage,
  isNodeError,
  succeed,
  type AccessFailure,
  type ErrorKind,
  type Outcome,
  type PolicyRestriction,
} from '../types/index.js';
import { relativeTo, resolvePath, type ResolvedPath } from '../security/path-resolver.js';
import { isContained, type AllowedRoot } from '../security/containment.js';
import { checkPolicy } from '../security/policy-filter.js';
import type { Sandbox } from '../security/sandbox.js';

export interface FileMetadata {
  name: string;
  path: string;
  relativePath: string;
  size: number;
  modified: string;
  extension: string;
  readable: boolean;
  restriction?: PolicyRestriction;
}

export interface DirectoryMetadata {
  name: string;
  path: string;
  relativePath: string;
}

export interface DirectoryContents {
  directory: string;
  files: FileMetadata[];
  subdirectories: DirectoryMetadata[];
  totalFiles: number;
  truncated: boolean;
}

export interface DirectoryFailure {
  directory: string;
  error: AccessFailure;
}

export type DirectoryListing = DirectoryContents | DirectoryFailure;

export interface EnumerateOptions {
  /** Walk subdirectories too, bounded by the policy's `maxListDepth` */
  recursive?: boolean;
  /** Stops the walk early; the listing is then marked truncated */
  signal?: AbortSignal;
  /**
   * Epoch milliseconds after which the walk stops, marking the listing
   * truncated. The walk is synchronous, so a signal can only fire before
   * it starts; the deadline is checked between entries.
   */
  deadline?: number;
}

export function isDirectoryFailure(listing: DirectoryListing): listing is DirectoryFailure {
  return 'error' in listing;
}

interface WalkState {
  root: AllowedRoot;
  contents: DirectoryContents;
  visited: Set<string>;
  maxDepth: number;
  signal?: AbortSignal;
  deadline?: number;
}

export class DirectoryEnumerator {
  constructor(private readonly sandbox: Sandbox) {}

  /**
   * List `target`, or every allowed root in configured order when `target`
   * is `null`. A root that fails is reported in its own entry and the
   * remaining roots are still listed.
   */
  enumerate(target: ResolvedPath | null, options: EnumerateOptions = {}): DirectoryListing[] {
    if (target === null) {
      return this.sandbox.roots.map((root) => this.enumerateRoot(root, options));
    }

    const root = isContained(target, this.sandbox.roots);
    if (!root.ok) {
      return [{ directory: target.path, error: root.failure }];
    }

    return [this.enumerateDirectory(target, root.value, options)];
  }

  private enumerateRoot(root: AllowedRoot, options: EnumerateOptions): DirectoryListing {
    const directory = root.path.path;
    const current = resolvePath(directory);

    if (!current.ok) {
      const message = current.failure.errorKind === 'NotFound' ? 'Directory does not exist' : current.failure.message;
      return { directory, error: { errorKind: current.failure.errorKind, message } };
    }

    // Replaced since startup, e.g. by a symlink to somewhere else
    if (!current.value.equals(root.path)) {
      return {
        directory,
        error: { errorKind: 'NotAllowed', message: 'Directory no longer resolves to the configured location' },
      };
    }

    return this.enumerateDirectory(root.path, root, options);
  }

  private enumerateDirectory(
    directory: ResolvedPath,
    root: AllowedRoot,
    options: EnumerateOptions
  ): DirectoryListing {
    const names = readNames(directory);
    if (!names.ok) {
      return { directory: directory.path, error: names.failure };
    }

    const state: WalkState = {
      root,
      contents: { directory: directory.path, files: [], subdirectories: [], totalFiles: 0, truncated: false },
      visited: new Set([directory.path]),
      maxDepth: options.recursive ? this.sandbox.policy.maxListDepth : 1,
      signal: options.signal,
      deadline: options.deadline,
    };

    this.walk(state, directory, directory.path, names.value, 1);
    state.contents.totalFiles = state.contents.files.length;
    return state.contents;
  }

  private walk(
    state: WalkState,
    current: ResolvedPath,
    lexicalDir: string,
    names: string[],
    depth: number
  ): void {
    const { contents } = state;
    const { maxListEntries } = this.sandbox.policy;

    for (const name of names) {
      if (shouldStop(state, maxListEntries)) {
        contents.truncated = true;
        return;
      }

      const entry = this.inspect(current, name);
      if (entry === null) continue;

      const path = join(lexicalDir, name);
      const relativePath = relativeTo(state.root.path, path);

      if (entry.stats.isDirectory()) {
        contents.subdirectories.push({ name, path, relativePath });

        if (depth < state.maxDepth && !state.visited.has(entry.resolved.path)) {
          state.visited.add(entry.resolved.path);
          const children = readNames(entry.resolved);
          if (children.ok) {
            this.walk(state, entry.resolved, path, children.value, depth + 1);
          }
        }
      } else if (entry.stats.isFile()) {
        contents.files.push(this.describeFile(name, path, relativePath, entry.resolved, entry.stats));
      }
    }
  }

  /**
   * Resolve one directory entry; `null` for anything that does not resolve,
   * leaves the sandbox, or cannot be stat'ed.
   */
  private inspect(directory: ResolvedPath, name: string): { resolved: ResolvedPath; stats: Stats } | null {
    const resolved = resolvePath(name, directory);
    if (!resolved.ok) return null;
    if (!isContained(resolved.value, this.sandbox.roots).ok) return null;

    try {
      return { resolved: resolved.value, stats: statSync(resolved.value.path) };
    } catch {
      // Removed between readdir and stat
      return null;
    }
  }

  private describeFile(
    name: string,
    path: string,
    relativePath: string,
    resolved: ResolvedPath,
    stats: Stats
  ): FileMetadata {
    const metadata: FileMetadata = {
      name,
      path,
      relativePath,
      size: stats.size,
      modified: stats.mtime.toISOString(),
      extension: extname(name),
      readable: true,
    };

    const policy = checkPolicy(resolved, stats, this.sandbox.policy);
    if (!policy.ok && isRestriction(policy.failure.errorKind)) {
      metadata.readable = false;
      metadata.restriction = policy.failure.errorKind;
    }

    return metadata;
  }
}

function shouldStop(state: WalkState, maxListEntries: number): boolean {
  const { contents } = state;
  if (contents.files.length + contents.subdirectories.length >= maxListEntries) return true;
  if (state.signal?.aborted) return true;
  return state.deadline !== undefined && Date.now() >= state.deadline;
}

function isRestriction(kind: ErrorKind): kind is PolicyRestriction {
  return kind === 'FileTooLarge' || kind === 'ExtensionNotAllowed';
}

/** Entry names sorted by UTF-16 code unit, independent of filesystem order. */
function readNames(directory: ResolvedPath): Outcome<string[]> {
  try {
    return succeed(readdirSync(directory.path).sort());
  } catch (error) {
    if (isNodeError(error, 'ENOENT')) {
      return fail('NotFound', 'Directory does not exist');
    }
    if (isNodeError(error, 'ENOTDIR')) {
      return fail('InvalidPath', 'Path is not a directory');
    }
    return fail('IOError', `Failed to read directory: ${getErrorMessage(error)}`);
  }
}
