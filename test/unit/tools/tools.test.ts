import { afterEach, describe, expect, it, vi } from 'vitest';
import { join } from 'node:path';
import { createSandbox } from '@/security/sandbox.js';
import { getConfig, listFiles, readFile, runTool, type ToolContext } from '@/tools/index.js';
import { sanitizeArgs } from '@/utils/audit.js';
import { createLogger } from '@/utils/logger.js';
import { ACCESS_DENIED_MESSAGE, succeed } from '@/types/index.js';
import type { ServerConfig } from '@/config/schema.js';
import {
  createTempDir,
  parseToolResult,
  removeTempDirs,
  testConfig,
  writeFixture,
} from '../../helpers/fixture.js';

function contextFor(overrides: Partial<ServerConfig> = {}): ToolContext {
  return {
    sandbox: createSandbox(testConfig(overrides)),
    logger: createLogger({ silent: true }),
  };
}

afterEach(() => {
  removeTempDirs();
  vi.restoreAllMocks();
});

describe('readFile tool', () => {
  it('returns the file as JSON text content', () => {
    const root = createTempDir();
    const filePath = writeFixture(root, 'notes.txt', 'hello');

    const { isError, body } = parseToolResult(readFile({ filePath }, contextFor({ allowedDirectories: [root] })));

    expect(isError).toBe(false);
    expect(body).toMatchObject({ filePath, name: 'notes.txt', size: 5, content: 'hello', contentType: 'text' });
  });

  it('returns a denied read as an error result and logs the attempt', () => {
    const root = createTempDir();
    const context = contextFor({ allowedDirectories: [root] });
    const warn = vi.spyOn(context.logger, 'warn');

    const { isError, body } = parseToolResult(readFile({ filePath: '/etc/passwd' }, context));

    expect(isError).toBe(true);
    expect(body).toEqual({ errorKind: 'NotAllowed', message: ACCESS_DENIED_MESSAGE });
    expect(warn).toHaveBeenCalledWith(
      'Access blocked: NotAllowed',
      expect.objectContaining({ tool: 'lf_read_file', requestedPath: '/etc/passwd' })
    );
  });
});

describe('listFiles tool', () => {
  it('lists the allowed roots', () => {
    const root = createTempDir();
    writeFixture(root, 'a.txt', 'a');

    const { isError, body } = parseToolResult(listFiles({}, contextFor({ allowedDirectories: [root] })));

    expect(isError).toBe(false);
    expect(body.allowedDirectories).toEqual([root]);
    expect(body.totalDirectories).toBe(1);
  });

  it('reports a file target as InvalidPath', () => {
    const root = createTempDir();
    const filePath = writeFixture(root, 'a.txt', 'a');

    const { isError, body } = parseToolResult(
      listFiles({ directoryPath: filePath }, contextFor({ allowedDirectories: [root] }))
    );

    expect(isError).toBe(true);
    expect(body.errorKind).toBe('InvalidPath');
  });
});

describe('getConfig tool', () => {
  it('describes the active sandbox', () => {
    const root = createTempDir();
    const missing = join(root, 'missing');

    const { isError, body } = parseToolResult(
      getConfig({}, contextFor({ allowedDirectories: [root, missing] }))
    );

    expect(isError).toBe(false);
    expect(body).toEqual({
      status: 'configured',
      allowedDirectories: [root, missing],
      resolvedDirectories: [root],
      rejectedDirectories: [{ directory: missing, reason: 'Path does not exist' }],
      maxFileSizeBytes: 1000,
      allowedExtensions: ['.txt', '.md'],
      maxListDepth: 10,
      maxListEntries: 10000,
      listTimeoutMs: 30000,
    });
  });

  it('is an error result when nothing is configured', () => {
    const { isError, body } = parseToolResult(getConfig({}, contextFor()));

    expect(isError).toBe(true);
    expect(body).toMatchObject({
      errorKind: 'NotConfigured',
      status: 'not_configured',
      allowedDirectories: [],
      resolvedDirectories: [],
    });
  });
});

describe('runTool', () => {
  it('turns a thrown error into an IOError result', () => {
    const context = contextFor();
    const error = vi.spyOn(context.logger, 'error');

    const result = runTool('lf_test', {}, undefined, context, () => {
      throw new Error('boom');
    });

    expect(parseToolResult(result)).toEqual({
      isError: true,
      body: { errorKind: 'IOError', message: 'Unexpected error: boom' },
    });
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('logs request and response with a correlation ID', () => {
    const context = contextFor();
    const info = vi.spyOn(context.logger, 'info');

    runTool('lf_test', { filePath: '/data/a.txt' }, '/data/a.txt', context, () => succeed(1));

    const correlationId = expect.stringMatching(/^corr-\d+-\d+$/);

    expect(info).toHaveBeenCalledTimes(2);
    expect(info).toHaveBeenNthCalledWith(
      1,
      'Tool call: lf_test',
      expect.objectContaining({ correlationId, args: { filePath: '/data/a.txt' } })
    );
    expect(info).toHaveBeenNthCalledWith(
      2,
      'Tool completed: lf_test',
      expect.objectContaining({ correlationId, success: true })
    );
  });
});

describe('sanitizeArgs', () => {
  it('truncates long strings and keeps other values', () => {
    expect(sanitizeArgs({ filePath: 'a'.repeat(250), recursive: true })).toEqual({
      filePath: 'a'.repeat(200) + '...[truncated]',
      recursive: true,
    });
  });
});
