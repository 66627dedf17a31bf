/**
 * Logger
 *
 * stdout belongs to the MCP stdio transport, so every level goes to stderr.
 */

import winston from 'winston';
import type { LogLevel } from '../config/schema.js';

const { combine, timestamp, printf } = winston.format;

export type Logger = winston.Logger;

const lineFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let line = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    line += ` ${JSON.stringify(metadata)}`;
  }

  return line;
});

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', silent = false } = options;

  return winston.createLogger({
    level,
    silent,
    format: combine(timestamp(), lineFormat),
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });
}
