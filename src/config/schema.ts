/**
 * Configuration schema
 *
 * Raw values arrive as strings from `.env` files and the environment;
 * the schema splits, coerces and bounds them.
 */

import { z } from 'zod';
import { normalizeExtension } from '../security/policy-filter.js';

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
export const DEFAULT_MAX_LIST_DEPTH = 10;
export const DEFAULT_MAX_LIST_ENTRIES = 10000;
export const DEFAULT_LIST_TIMEOUT_MS = 30_000;
export const DEFAULT_ALLOWED_EXTENSIONS = [
  '.txt', '.md', '.py', '.js', '.json', '.yaml', '.yml', '.csv', '.xml', '.html', '.css',
];

/** `ALLOWED_EXTENSIONS=*` lifts the extension restriction. */
export const ANY_EXTENSION = '*';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const commaList = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item !== ''));

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

export const rawConfigSchema = z.object({
  ALLOWED_DIRECTORIES: commaList.default(''),
  MAX_FILE_SIZE: positiveInt('MAX_FILE_SIZE').default(DEFAULT_MAX_FILE_SIZE),
  ALLOWED_EXTENSIONS: commaList
    .transform((items) => (items.includes(ANY_EXTENSION) ? [] : items.map(normalizeExtension)))
    .default(DEFAULT_ALLOWED_EXTENSIONS.join(',')),
  MAX_LIST_DEPTH: positiveInt('MAX_LIST_DEPTH').default(DEFAULT_MAX_LIST_DEPTH),
  MAX_LIST_ENTRIES: positiveInt('MAX_LIST_ENTRIES').default(DEFAULT_MAX_LIST_ENTRIES),
  LIST_TIMEOUT_MS: positiveInt('LIST_TIMEOUT_MS').default(DEFAULT_LIST_TIMEOUT_MS),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ServerConfig {
  allowedDirectories: string[];
  maxFileSizeBytes: number;
  allowedExtensions: string[];
  maxListDepth: number;
  maxListEntries: number;
  listTimeoutMs: number;
  logLevel: LogLevel;
}
