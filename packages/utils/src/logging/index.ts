/**
 * Centralized Logging System
 * ==========================
 * Package-aware logging with namespaces.
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@expsync/utils';
 *
 * const logger = createPackageLogger('@expsync/storage');
 * logger.debug('Saved experiment', { experimentName: 'exp1' });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

/**
 * Package logger registry
 */
const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log database query with timing
   */
  static dbQuery(
    logger: Logger,
    operation: string,
    table: string,
    duration: number,
    context?: LogContext
  ): void {
    logger.debug('Database Query', { operation, table, duration, ...context });
  }
}

export { roundFloatsForLogging } from './format.js';
