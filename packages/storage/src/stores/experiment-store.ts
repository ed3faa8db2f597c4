/**
 * Experiment Store
 *
 * Loads and saves whole experiment graphs by name. Only the full
 * experiment variant is supported.
 */

import { isFullExperiment, type Experiment, type GenerationStrategy } from '@expsync/core';
import type { StoreConfiguration } from '../config/store-configuration.js';
import { ensureConnection } from '../connection/connection-manager.js';
import { UnsupportedExperimentVariantError } from '../errors.js';
import { timeOperation } from '../instrumentation.js';
import { findGenerationStrategyByExperiment } from './generation-strategy-store.js';

/**
 * @throws UnsupportedExperimentVariantError when the stored object is not a full experiment
 */
export async function loadExperiment(
  experimentName: string,
  configuration: StoreConfiguration
): Promise<Experiment> {
  const connection = await ensureConnection(configuration);
  return timeOperation(
    `Loaded experiment ${experimentName}`,
    async () => {
      const experiment = await configuration.decoder.loadExperiment(connection, experimentName);
      if (!isFullExperiment(experiment)) {
        throw new UnsupportedExperimentVariantError(experimentName, experiment.kind);
      }
      return experiment;
    },
    { experimentName }
  );
}

/**
 * Insert the experiment graph, or overwrite the stored one with the same name
 */
export async function saveExperiment(
  experiment: Experiment,
  configuration: StoreConfiguration
): Promise<void> {
  const connection = await ensureConnection(configuration);
  await timeOperation(
    `Saved experiment ${experiment.name}`,
    () => configuration.encoder.saveExperiment(connection, experiment),
    { experimentName: experiment.name }
  );
}

/**
 * Load an experiment together with its generation strategy; the strategy
 * is null when none has been attached yet.
 */
export async function loadExperimentAndGenerationStrategy(
  experimentName: string,
  configuration: StoreConfiguration
): Promise<[Experiment, GenerationStrategy | null]> {
  const experiment = await loadExperiment(experimentName, configuration);
  const lookup = await findGenerationStrategyByExperiment(experimentName, configuration);
  return [experiment, lookup.found ? lookup.strategy : null];
}
