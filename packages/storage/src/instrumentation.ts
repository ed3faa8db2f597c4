/**
 * Instrumentation Wrapper
 *
 * Times a store operation and logs "<message> in <seconds> seconds." at
 * debug level, with two decimals. Results and errors pass through unchanged.
 */

import { roundFloatsForLogging } from '@expsync/utils';
import type { LogContext } from '@expsync/utils';
import { logger } from './logger.js';

export async function timeOperation<T>(
  message: string,
  work: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const startTime = Date.now();
  const result = await work();
  const durationSeconds = roundFloatsForLogging((Date.now() - startTime) / 1000);

  logger.debug(`${message} in ${durationSeconds.toFixed(2)} seconds.`, { ...context, durationSeconds });
  return result;
}
