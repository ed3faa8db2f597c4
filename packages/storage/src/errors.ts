/**
 * Storage Errors
 * ==============
 * Failures surfaced by the experiment sync layer. All extend AppError so
 * callers can branch on `code`; the original cause is always kept.
 */

import { AppError } from '@expsync/utils';

/**
 * The decoded object is not a full experiment
 */
export class UnsupportedExperimentVariantError extends AppError {
  public readonly experimentName: string;
  public readonly variant: string;

  constructor(experimentName: string, variant: string) {
    super(
      `Experiment '${experimentName}' is a ${variant}; only full experiments are supported`,
      'UNSUPPORTED_EXPERIMENT_VARIANT',
      { experimentName, variant }
    );
    this.experimentName = experimentName;
    this.variant = variant;
  }
}

/**
 * No generation strategy is attached to the named experiment
 */
export class NoStrategyAttachedError extends AppError {
  public readonly experimentName: string;

  constructor(experimentName: string) {
    super(
      `No generation strategy attached to experiment '${experimentName}'`,
      'NO_STRATEGY_ATTACHED',
      { experimentName }
    );
    this.experimentName = experimentName;
  }
}

/**
 * A connection for the target could not be established
 */
export class ConnectionError extends AppError {
  constructor(message: string, target?: string, cause?: unknown) {
    super(message, 'CONNECTION_ERROR', { target }, { cause, isOperational: false });
  }
}

/**
 * Translating between domain objects and durable rows failed
 */
export class EncodeDecodeError extends AppError {
  constructor(message: string, entity: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'ENCODE_DECODE_ERROR', { entity, ...context }, { cause });
  }
}

/**
 * Generator runs handed to an update are not the pending suffix of the
 * strategy history
 */
export class CheckpointMismatchError extends AppError {
  constructor(strategyName: string, persistedRunCount: number, pendingRunCount: number, receivedRunCount: number) {
    super(
      `Generator runs for strategy '${strategyName}' do not continue its checkpoint at ${persistedRunCount}: ` +
        `${pendingRunCount} pending, ${receivedRunCount} received`,
      'CHECKPOINT_MISMATCH',
      { strategyName, persistedRunCount, pendingRunCount, receivedRunCount }
    );
  }
}
