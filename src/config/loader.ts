/**
 * Configuration loader
 *
 * Later sources win: defaults, then the `.env` file, then the process
 * environment. The `.env` file is parsed, never loaded into `process.env`.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { parse } from 'dotenv';
import { getErrorMessage } from '../types/index.js';
import { rawConfigSchema, type ServerConfig } from './schema.js';

export const CONFIG_KEYS = [
  'ALLOWED_DIRECTORIES',
  'MAX_FILE_SIZE',
  'ALLOWED_EXTENSIONS',
  'MAX_LIST_DEPTH',
  'MAX_LIST_ENTRIES',
  'LIST_TIMEOUT_MS',
  'LOG_LEVEL',
] as const;

export class ConfigurationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export interface LoadConfigOptions {
  /** Defaults to `process.env` */
  env?: Record<string, string | undefined>;
  /** Defaults to `.env` in `cwd`; `null` skips the file */
  envFile?: string | null;
  /** Defaults to `process.cwd()` */
  cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const { env = process.env, cwd = process.cwd() } = options;
  const envFile = options.envFile === undefined ? resolve(cwd, '.env') : options.envFile;

  const fileValues = envFile !== null ? readEnvFile(envFile) : {};
  const raw: Record<string, string> = {};

  for (const key of CONFIG_KEYS) {
    // Empty values count as unset
    const value = env[key]?.trim() || fileValues[key]?.trim();
    if (value) raw[key] = value;
  }

  const result = rawConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    allowedDirectories: parsed.ALLOWED_DIRECTORIES,
    maxFileSizeBytes: parsed.MAX_FILE_SIZE,
    allowedExtensions: parsed.ALLOWED_EXTENSIONS,
    maxListDepth: parsed.MAX_LIST_DEPTH,
    maxListEntries: parsed.MAX_LIST_ENTRIES,
    listTimeoutMs: parsed.LIST_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}

function readEnvFile(envFile: string): Record<string, string> {
  if (!existsSync(envFile)) return {};

  try {
    return parse(readFileSync(envFile));
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${envFile}: ${getErrorMessage(error)}`);
  }
}
