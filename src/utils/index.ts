/**
 * Utility exports
 */

export { createLogger, type Logger, type LoggerOptions } from './logger.js';

export {
  generateCorrelationId,
  logRequest,
  logResponse,
  logSecurityEvent,
  sanitizeArgs,
} from './audit.js';
