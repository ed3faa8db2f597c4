/**
 * @expsync/utils - Shared utilities package
 *
 * Public API exports for the utils package:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 *
 * NO database code - that lives in @expsync/storage
 */

export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

export { createPackageLogger, LogHelpers, roundFloatsForLogging } from './logging/index.js';

export { getStorageDatabaseConfig, CHECKPOINT_POLICIES } from './config/index.js';
export type { StorageDatabaseConfig, CheckpointPolicy } from './config/index.js';

export {
  AppError,
  ValidationError,
  NotFoundError,
  ConfigurationError,
  isOperationalError,
  hasErrorCode,
} from './errors.js';
export type { ErrorContext } from './errors.js';
