/**
 * Get Config Tool
 *
 * Reports the active sandbox for operators. An unusable configuration is
 * an error result carrying the snapshot, never an empty success.
 */

import { z } from 'zod';
import type { Sandbox } from '../security/sandbox.js';
import { failureResult, jsonResult, type ToolContext, type ToolResult } from './tool-runner.js';

export const GET_CONFIG_TOOL = 'lf_get_config';

export const getConfigSchema = z.object({});

export type GetConfigArgs = z.infer<typeof getConfigSchema>;

export interface ConfigSnapshot {
  status: 'configured' | 'not_configured';
  allowedDirectories: string[];
  resolvedDirectories: string[];
  rejectedDirectories: Array<{ directory: string; reason: string }>;
  maxFileSizeBytes: number;
  allowedExtensions: string[];
  maxListDepth: number;
  maxListEntries: number;
  listTimeoutMs: number;
}

export function describeSandbox(sandbox: Sandbox): ConfigSnapshot {
  return {
    status: sandbox.isConfigured ? 'configured' : 'not_configured',
    allowedDirectories: [...sandbox.configuredDirectories],
    resolvedDirectories: sandbox.roots.map((root) => root.path.path),
    rejectedDirectories: sandbox.rejected.map((entry) => ({ directory: entry.configured, reason: entry.reason })),
    maxFileSizeBytes: sandbox.policy.maxFileSizeBytes,
    allowedExtensions: [...sandbox.policy.allowedExtensions],
    maxListDepth: sandbox.policy.maxListDepth,
    maxListEntries: sandbox.policy.maxListEntries,
    listTimeoutMs: sandbox.policy.listTimeoutMs,
  };
}

export function getConfig(_args: GetConfigArgs, context: ToolContext): ToolResult {
  const snapshot = describeSandbox(context.sandbox);
  const configured = context.sandbox.requireConfigured();

  if (!configured.ok) {
    context.logger.warn('Configuration requested while no allowed directories are usable');
    return failureResult(configured.failure, { ...snapshot });
  }

  return jsonResult(snapshot);
}
