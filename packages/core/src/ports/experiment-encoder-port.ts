/**
 * Experiment Encoder Port
 *
 * Converts in-memory domain objects into their durable representation and
 * writes them through the given connection.
 */

import type { Experiment, Trial } from '../domain/experiments/types.js';
import type { GenerationStrategy, GeneratorRun } from '../domain/generation/types.js';
import type { StorageConnection } from './storage-connection-port.js';

export interface ExperimentEncoderPort {
  /**
   * Insert the experiment graph, or overwrite it when the name already exists.
   *
   * @returns Durable experiment id
   */
  saveExperiment(connection: StorageConnection, experiment: Experiment): Promise<number>;

  /**
   * Insert trials that are not yet durable, with their attached data.
   * Must never overwrite an existing trial index.
   */
  saveNewTrials(connection: StorageConnection, experiment: Experiment, trials: readonly Trial[]): Promise<void>;

  /**
   * Update trials that are already durable, with their attached data.
   */
  updateTrials(connection: StorageConnection, experiment: Experiment, trials: readonly Trial[]): Promise<void>;

  /**
   * Insert a strategy that was never persisted, with its full run history.
   *
   * @returns Durable generation strategy id
   */
  saveGenerationStrategy(connection: StorageConnection, strategy: GenerationStrategy): Promise<number>;

  /**
   * Append runs to an already persisted strategy. `runs` start at
   * position `strategy.persistedRunCount`.
   */
  appendGeneratorRuns(
    connection: StorageConnection,
    strategy: GenerationStrategy,
    runs: readonly GeneratorRun[]
  ): Promise<void>;
}
