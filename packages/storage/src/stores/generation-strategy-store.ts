/**
 * Generation Strategy Store
 *
 * Strategies are saved once with their full history and afterwards only
 * ever appended to: an update writes the generator runs produced since the
 * checkpoint (`persistedRunCount`) and moves the checkpoint past them, so
 * the cost of an update grows with the new runs, not the whole history.
 */

import {
  advanceCheckpoint,
  isPendingSuffix,
  pendingGeneratorRuns,
  type GenerationStrategy,
  type GeneratorRun,
} from '@expsync/core';
import type { StoreConfiguration } from '../config/store-configuration.js';
import { ensureConnection } from '../connection/connection-manager.js';
import { CheckpointMismatchError, NoStrategyAttachedError } from '../errors.js';
import { timeOperation } from '../instrumentation.js';

export type GenerationStrategyLookup =
  | { found: true; strategy: GenerationStrategy }
  | { found: false; reason: 'no_strategy_attached'; experimentName: string };

/**
 * Look up the strategy attached to the named experiment. Absence is a
 * result, not an error.
 */
export async function findGenerationStrategyByExperiment(
  experimentName: string,
  configuration: StoreConfiguration
): Promise<GenerationStrategyLookup> {
  const connection = await ensureConnection(configuration);
  const strategy = await timeOperation(
    `Loaded generation strategy of experiment ${experimentName}`,
    () => configuration.decoder.loadGenerationStrategyByExperimentName(connection, experimentName),
    { experimentName }
  );

  if (!strategy) {
    return { found: false, reason: 'no_strategy_attached', experimentName };
  }
  return { found: true, strategy };
}

/**
 * @throws NoStrategyAttachedError when the experiment has no strategy
 */
export async function loadGenerationStrategyByExperiment(
  experimentName: string,
  configuration: StoreConfiguration
): Promise<GenerationStrategy> {
  const lookup = await findGenerationStrategyByExperiment(experimentName, configuration);
  if (!lookup.found) {
    throw new NoStrategyAttachedError(experimentName);
  }
  return lookup.strategy;
}

/**
 * First save of a strategy, with its whole run history. Afterwards the
 * checkpoint covers every run.
 */
export async function saveGenerationStrategy(
  strategy: GenerationStrategy,
  configuration: StoreConfiguration
): Promise<void> {
  const connection = await ensureConnection(configuration);
  await timeOperation(
    `Saved generation strategy ${strategy.name}`,
    async () => {
      strategy.dbId = await configuration.encoder.saveGenerationStrategy(connection, strategy);
      strategy.persistedRunCount = strategy.generatorRuns.length;
    },
    { strategyName: strategy.name }
  );
}

/**
 * Persist `newGeneratorRuns`, the runs produced since the last checkpoint,
 * in their original order.
 *
 * Under the 'trust' policy the caller's bookkeeping is taken as is; under
 * 'strict' the runs must be exactly `pendingGeneratorRuns(strategy)`.
 */
export async function updateGenerationStrategy(
  strategy: GenerationStrategy,
  newGeneratorRuns: readonly GeneratorRun[],
  configuration: StoreConfiguration
): Promise<void> {
  const connection = await ensureConnection(configuration);

  if (configuration.checkpointPolicy === 'strict' && !isPendingSuffix(strategy, newGeneratorRuns)) {
    throw new CheckpointMismatchError(
      strategy.name,
      strategy.persistedRunCount,
      pendingGeneratorRuns(strategy).length,
      newGeneratorRuns.length
    );
  }

  await timeOperation(
    `Updated generation strategy ${strategy.name}`,
    async () => {
      if (newGeneratorRuns.length === 0) {
        return;
      }
      await configuration.encoder.appendGeneratorRuns(connection, strategy, newGeneratorRuns);
      advanceCheckpoint(strategy, newGeneratorRuns.length);
    },
    { strategyName: strategy.name, newRunCount: newGeneratorRuns.length }
  );
}
