/**
 * Experiment Decoder Port
 *
 * Reads durable rows back into domain objects and resolves names to ids.
 */

import type { AnyExperiment } from '../domain/experiments/types.js';
import type { GenerationStrategy } from '../domain/generation/types.js';
import type { StorageConnection } from './storage-connection-port.js';

export interface ExperimentDecoderPort {
  /**
   * @returns Durable id or null when no experiment has that name
   */
  findExperimentId(connection: StorageConnection, experimentName: string): Promise<number | null>;

  /**
   * @returns Durable id of the strategy attached to the named experiment, or null
   */
  findGenerationStrategyId(connection: StorageConnection, experimentName: string): Promise<number | null>;

  /**
   * Decode the full experiment graph (trials, data).
   * Throws NotFoundError when no experiment has that name.
   */
  loadExperiment(connection: StorageConnection, experimentName: string): Promise<AnyExperiment>;

  /**
   * @returns The attached strategy with its checkpoint at its durable run count, or null
   */
  loadGenerationStrategyByExperimentName(
    connection: StorageConnection,
    experimentName: string
  ): Promise<GenerationStrategy | null>;
}
