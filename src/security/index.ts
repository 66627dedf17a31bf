/**
 * Security boundary exports
 */

export {
  type ResolvedPath,
  checkRequestPath,
  resolvePath,
  resolveNearestAncestor,
  relativeTo,
  absoluteFrom,
  MAX_PATH_LENGTH,
} from './path-resolver.js';

export { isContained, isWithinRoot, type AllowedRoot } from './containment.js';

export {
  checkPolicy,
  classifyContent,
  normalizeExtension,
  NO_EXTENSION,
  type PolicyConfig,
  type PolicyAcceptance,
  type ContentType,
} from './policy-filter.js';

export {
  Sandbox,
  createSandbox,
  type ContainedPath,
  type RejectedDirectory,
  type SandboxOptions,
} from './sandbox.js';
