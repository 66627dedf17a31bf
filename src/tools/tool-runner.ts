/**
 * Shared tool plumbing: audit records, failure mapping and MCP text
 * content. Handlers never throw to the transport.
 */

import { getErrorMessage, type AccessFailure, type Outcome } from '../types/index.js';
import type { Sandbox } from '../security/sandbox.js';
import {
  generateCorrelationId,
  logRequest,
  logResponse,
  logSecurityEvent,
  type Logger,
} from '../utils/index.js';

// A type alias rather than an interface so it satisfies the SDK's open result type
export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolContext {
  sandbox: Sandbox;
  logger: Logger;
  signal?: AbortSignal;
}

export function jsonResult(payload: unknown, isError = false): ToolResult {
  const result: ToolResult = {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
  if (isError) result.isError = true;
  return result;
}

export function failureResult(failure: AccessFailure, extra: Record<string, unknown> = {}): ToolResult {
  return jsonResult({ errorKind: failure.errorKind, message: failure.message, ...extra }, true);
}

/**
 * Run one tool call with request/response audit records.
 *
 * `requestedPath` is the raw path argument, logged with any `NotAllowed`.
 */
export function runTool<T>(
  tool: string,
  args: Record<string, unknown>,
  requestedPath: string | undefined,
  context: ToolContext,
  operation: () => Outcome<T>
): ToolResult {
  const correlationId = generateCorrelationId();
  const startTime = Date.now();
  logRequest(context.logger, correlationId, tool, args);

  let outcome: Outcome<T>;
  try {
    outcome = operation();
  } catch (error) {
    context.logger.error(`Unexpected error in ${tool}`, { correlationId, error: getErrorMessage(error) });
    outcome = { ok: false, failure: { errorKind: 'IOError', message: `Unexpected error: ${getErrorMessage(error)}` } };
  }

  if (!outcome.ok) {
    if (outcome.failure.errorKind === 'NotAllowed') {
      logSecurityEvent(context.logger, correlationId, tool, requestedPath ?? '', outcome.failure);
    }
    logResponse(context.logger, correlationId, tool, Date.now() - startTime, outcome.failure);
    return failureResult(outcome.failure);
  }

  logResponse(context.logger, correlationId, tool, Date.now() - startTime);
  return jsonResult(outcome.value);
}
