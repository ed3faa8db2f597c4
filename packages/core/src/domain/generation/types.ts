/**
 * Generation Strategy Domain Types
 */

import type { DateTime } from 'luxon';
import type { Arm } from '../experiments/types.js';

/**
 * GeneratorRun: one immutable proposal step
 */
export interface GeneratorRun {
  readonly id: string;
  /** Generator that produced the proposal, e.g. "sobol" or "gpei" */
  readonly generatorKey: string;
  readonly arms: readonly Arm[];
  readonly createdAt: DateTime;
  readonly generationStepIndex?: number;
}

/**
 * GenerationStep: how many trials one generator is responsible for
 */
export interface GenerationStep {
  generatorKey: string;
  /** -1 means unlimited */
  numTrials: number;
}

/**
 * GenerationStrategy: the policy producing new trial proposals over time.
 *
 * `generatorRuns` is append-only. `persistedRunCount` is the checkpoint:
 * runs below it are durable, runs at or above it are pending.
 */
export interface GenerationStrategy {
  name: string;
  experimentName?: string;
  steps: GenerationStep[];
  generatorRuns: GeneratorRun[];
  persistedRunCount: number;
  dbId?: number;
}
