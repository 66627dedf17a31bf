/**
 * Policy Filter
 *
 * Size and extension rules applied to a path already proven to be inside
 * an allowed root, plus text/binary classification for reads.
 */

import { extname } from 'path';
import type { Stats } from 'fs';
import { fail, succeed, type Outcome } from '../types/index.js';
import type { ResolvedPath } from './path-resolver.js';

/** Listed in `allowedExtensions` to admit files that have no extension. */
export const NO_EXTENSION = '.';

export interface PolicyConfig {
  readonly maxFileSizeBytes: number;
  /** Lowercase, dot-prefixed; empty means no restriction */
  readonly allowedExtensions: ReadonlySet<string>;
  readonly maxListDepth: number;
  readonly maxListEntries: number;
  /** Wall-clock budget for one list request */
  readonly listTimeoutMs: number;
}

export interface PolicyAcceptance {
  kind: 'file' | 'directory';
  size: number;
}

export type ContentType = 'text' | 'binary';

/**
 * Check a contained path against the read policy.
 */
export function checkPolicy(
  path: ResolvedPath,
  stats: Stats,
  config: PolicyConfig
): Outcome<PolicyAcceptance> {
  if (stats.isDirectory()) {
    return succeed({ kind: 'directory', size: stats.size });
  }

  if (stats.size > config.maxFileSizeBytes) {
    return fail(
      'FileTooLarge',
      `File size ${stats.size} bytes exceeds the limit of ${config.maxFileSizeBytes} bytes`
    );
  }

  if (config.allowedExtensions.size > 0) {
    const ext = extname(path.path).toLowerCase();
    const allowed = ext === '' ? config.allowedExtensions.has(NO_EXTENSION) : config.allowedExtensions.has(ext);
    if (!allowed) {
      return fail(
        'ExtensionNotAllowed',
        `File extension not allowed. Allowed: ${[...config.allowedExtensions].join(', ')}`
      );
    }
  }

  return succeed({ kind: 'file', size: stats.size });
}

/**
 * Classify content by attempting a strict UTF-8 decode of the whole buffer;
 * callers only pass buffers already bounded by `maxFileSizeBytes`.
 */
export function classifyContent(bytes: Uint8Array): ContentType {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return 'text';
  } catch {
    return 'binary';
  }
}

/**
 * `TXT`, `.Txt` and ` .txt ` all become `.txt`; `.` stays the
 * no-extension sentinel.
 */
export function normalizeExtension(raw: string): string {
  const trimmed = raw.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}
