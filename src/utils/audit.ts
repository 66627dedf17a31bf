/**
 * Audit records
 *
 * One correlation ID per tool call ties the request, the security events
 * it triggered and the response together in the log.
 */

import type { Logger } from './logger.js';
import type { AccessFailure } from '../types/index.js';

const MAX_LOGGED_STRING = 200;

let idCounter = 0;

export function generateCorrelationId(): string {
  idCounter++;
  return `corr-${Date.now()}-${idCounter}`;
}

export function logRequest(
  logger: Logger,
  correlationId: string,
  tool: string,
  args: Record<string, unknown>
): void {
  logger.info(`Tool call: ${tool}`, {
    correlationId,
    tool,
    args: sanitizeArgs(args),
  });
}

export function logResponse(
  logger: Logger,
  correlationId: string,
  tool: string,
  durationMs: number,
  failure?: AccessFailure
): void {
  if (failure) {
    logger.info(`Tool failed: ${tool} - ${failure.errorKind}`, {
      correlationId,
      tool,
      success: false,
      durationMs,
      errorKind: failure.errorKind,
    });
    return;
  }

  logger.info(`Tool completed: ${tool}`, { correlationId, tool, success: true, durationMs });
}

/**
 * Denied access is logged with the requested path, which the caller never
 * gets back.
 */
export function logSecurityEvent(
  logger: Logger,
  correlationId: string,
  tool: string,
  requestedPath: string,
  failure: AccessFailure
): void {
  logger.warn(`Access blocked: ${failure.errorKind}`, {
    correlationId,
    tool,
    requestedPath: truncate(requestedPath),
    reason: failure.message,
  });
}

export function sanitizeArgs(args: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(args)) {
    sanitized[key] = typeof value === 'string' ? truncate(value) : value;
  }

  return sanitized;
}

function truncate(value: string): string {
  return value.length > MAX_LOGGED_STRING ? value.slice(0, MAX_LOGGED_STRING) + '...[truncated]' : value;
}
