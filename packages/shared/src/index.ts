/**
 * kuberoute - Shared Package
 * Snapshot model, collaborator interfaces, errors, logging and validation
 * @module @kuberoute/shared
 */

export * from './types/index.js';

export * from './errors/index.js';

export * from './validation/index.js';

export {
  Logger,
  createLogger,
  createServiceLogger,
  generateCorrelationId,
  getEnvLogLevel,
  isLogLevel,
  isTestEnvironment,
  logger,
  ALL_LOG_LEVELS,
} from './logging/logger.js';

export type { LogLevel, LogMeta, LogEntry, LoggerConfig } from './logging/logger.js';

export { withTimeout, TimeoutError, isTimeoutError } from './utils/timeout.js';
