/**
 * ExperimentStorage
 *
 * Every store operation bound to one StoreConfiguration, for callers that
 * keep a single configuration for a whole session.
 */

import type { Experiment, GenerationStrategy, GeneratorRun, Trial } from '@expsync/core';
import type { StoreConfiguration } from './config/store-configuration.js';
import { getExperimentId, getGenerationStrategyId } from './identity/identity-resolver.js';
import {
  loadExperiment,
  loadExperimentAndGenerationStrategy,
  saveExperiment,
} from './stores/experiment-store.js';
import {
  findGenerationStrategyByExperiment,
  loadGenerationStrategyByExperiment,
  saveGenerationStrategy,
  updateGenerationStrategy,
  type GenerationStrategyLookup,
} from './stores/generation-strategy-store.js';
import { saveNewTrial, saveNewTrials, saveUpdatedTrial, saveUpdatedTrials } from './stores/trial-store.js';

export class ExperimentStorage {
  constructor(public readonly configuration: StoreConfiguration) {}

  getExperimentId(experimentName: string): Promise<number | null> {
    return getExperimentId(experimentName, this.configuration);
  }

  getGenerationStrategyId(experimentName: string): Promise<number | null> {
    return getGenerationStrategyId(experimentName, this.configuration);
  }

  loadExperiment(experimentName: string): Promise<Experiment> {
    return loadExperiment(experimentName, this.configuration);
  }

  saveExperiment(experiment: Experiment): Promise<void> {
    return saveExperiment(experiment, this.configuration);
  }

  loadExperimentAndGenerationStrategy(
    experimentName: string
  ): Promise<[Experiment, GenerationStrategy | null]> {
    return loadExperimentAndGenerationStrategy(experimentName, this.configuration);
  }

  findGenerationStrategyByExperiment(experimentName: string): Promise<GenerationStrategyLookup> {
    return findGenerationStrategyByExperiment(experimentName, this.configuration);
  }

  loadGenerationStrategyByExperiment(experimentName: string): Promise<GenerationStrategy> {
    return loadGenerationStrategyByExperiment(experimentName, this.configuration);
  }

  saveGenerationStrategy(strategy: GenerationStrategy): Promise<void> {
    return saveGenerationStrategy(strategy, this.configuration);
  }

  updateGenerationStrategy(
    strategy: GenerationStrategy,
    newGeneratorRuns: readonly GeneratorRun[]
  ): Promise<void> {
    return updateGenerationStrategy(strategy, newGeneratorRuns, this.configuration);
  }

  saveNewTrial(experiment: Experiment, trial: Trial): Promise<void> {
    return saveNewTrial(experiment, trial, this.configuration);
  }

  saveNewTrials(experiment: Experiment, trials: readonly Trial[]): Promise<void> {
    return saveNewTrials(experiment, trials, this.configuration);
  }

  saveUpdatedTrial(experiment: Experiment, trial: Trial): Promise<void> {
    return saveUpdatedTrial(experiment, trial, this.configuration);
  }

  saveUpdatedTrials(experiment: Experiment, trials: readonly Trial[]): Promise<void> {
    return saveUpdatedTrials(experiment, trials, this.configuration);
  }
}
