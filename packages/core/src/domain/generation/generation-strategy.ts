/**
 * Generation strategy helpers
 *
 * Bookkeeping for the append-only generator run history and its durable
 * checkpoint.
 */

import { randomUUID } from 'crypto';
import { DateTime } from 'luxon';
import { ValidationError } from '../../errors.js';
import type { Arm } from '../experiments/types.js';
import type { GenerationStep, GenerationStrategy, GeneratorRun } from './types.js';

export interface CreateGenerationStrategyInput {
  name: string;
  steps: GenerationStep[];
  experimentName?: string;
}

export function createGenerationStrategy(input: CreateGenerationStrategyInput): GenerationStrategy {
  if (input.steps.length === 0) {
    throw new ValidationError('Generation strategy needs at least one step', {
      strategyName: input.name,
    });
  }
  return {
    name: input.name,
    experimentName: input.experimentName,
    steps: input.steps,
    generatorRuns: [],
    persistedRunCount: 0,
  };
}

export interface RecordGeneratorRunInput {
  generatorKey: string;
  arms: Arm[];
  generationStepIndex?: number;
  id?: string;
  createdAt?: DateTime;
}

/**
 * Append a new generator run to the strategy history
 */
export function recordGeneratorRun(
  strategy: GenerationStrategy,
  input: RecordGeneratorRunInput
): GeneratorRun {
  const run: GeneratorRun = {
    id: input.id ?? randomUUID(),
    generatorKey: input.generatorKey,
    arms: input.arms,
    createdAt: input.createdAt ?? DateTime.utc(),
    generationStepIndex: input.generationStepIndex,
  };
  strategy.generatorRuns.push(run);
  return run;
}

/**
 * Runs produced since the last durable checkpoint, in original order
 */
export function pendingGeneratorRuns(strategy: GenerationStrategy): GeneratorRun[] {
  return strategy.generatorRuns.slice(strategy.persistedRunCount);
}

/**
 * Whether `runs` is exactly the pending suffix of the strategy history
 */
export function isPendingSuffix(strategy: GenerationStrategy, runs: readonly GeneratorRun[]): boolean {
  const pending = pendingGeneratorRuns(strategy);
  return pending.length === runs.length && pending.every((run, i) => run === runs[i]);
}

/**
 * Move the checkpoint forward by `count` runs
 */
export function advanceCheckpoint(strategy: GenerationStrategy, count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError(`Checkpoint can only advance by a non-negative integer: ${count}`, {
      strategyName: strategy.name,
    });
  }
  strategy.persistedRunCount += count;
}
