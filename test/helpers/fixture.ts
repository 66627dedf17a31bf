/**
 * Test fixtures: temp directory trees, configs and outcome assertions.
 *
 * Temp directories are canonicalized so expected paths match what
 * `realpath` reports (macOS puts tmpdir behind /var -> /private/var).
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import type { ServerConfig } from '@/config/schema.js';
import type { AccessFailure, Outcome } from '@/types/index.js';
import { createLogger } from '@/utils/logger.js';

export const silentLogger = createLogger({ silent: true });

const created: string[] = [];

export function createTempDir(prefix = 'lf-test-'): string {
  const dir = realpathSync(mkdtempSync(join(tmpdir(), prefix)));
  created.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  while (created.length > 0) {
    const dir = created.pop();
    if (dir) rmSync(dir, { recursive: true, force: true });
  }
}

/** Write `content` at `relativePath` under `root`, creating parents. */
export function writeFixture(root: string, relativePath: string, content: string | Uint8Array): string {
  const filePath = join(root, relativePath);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

export function makeDir(root: string, relativePath: string): string {
  const dirPath = join(root, relativePath);
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    allowedDirectories: [],
    maxFileSizeBytes: 1000,
    allowedExtensions: ['.txt', '.md'],
    maxListDepth: 10,
    maxListEntries: 10000,
    listTimeoutMs: 30000,
    logLevel: 'error',
    ...overrides,
  };
}

export function expectOk<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new Error(`Expected success, got ${outcome.failure.errorKind}: ${outcome.failure.message}`);
  }
  return outcome.value;
}

export function expectFailure<T>(outcome: Outcome<T>): AccessFailure {
  if (outcome.ok) {
    throw new Error('Expected a failure, got success');
  }
  return outcome.failure;
}

const textResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
  isError: z.boolean().optional(),
});

/** Decode the JSON body of a tool result, from a handler or an MCP client. */
export function parseToolResult(result: unknown): { isError: boolean; body: Record<string, unknown> } {
  const parsed = textResultSchema.parse(result);
  const body = z.record(z.unknown()).parse(JSON.parse(parsed.content[0].text));
  return { isError: parsed.isError ?? false, body };
}
