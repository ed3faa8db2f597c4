/**
 * Trial Store
 *
 * Batched writes of new and updated trials, with the observation data the
 * experiment holds for them. Which trials are new and which are updated is
 * the caller's call; nothing here queries the store to find out.
 */

import type { Experiment, Trial } from '@expsync/core';
import { ValidationError } from '@expsync/utils';
import type { StoreConfiguration } from '../config/store-configuration.js';
import { ensureConnection } from '../connection/connection-manager.js';
import { timeOperation } from '../instrumentation.js';

function formatIndices(trials: readonly Trial[]): string {
  return `[${trials.map((trial) => trial.index).join(', ')}]`;
}

function assertNonEmpty(experiment: Experiment, trials: readonly Trial[]): void {
  if (trials.length === 0) {
    throw new ValidationError('At least one trial is required', { experimentName: experiment.name });
  }
}

export async function saveNewTrials(
  experiment: Experiment,
  trials: readonly Trial[],
  configuration: StoreConfiguration
): Promise<void> {
  assertNonEmpty(experiment, trials);
  const connection = await ensureConnection(configuration);
  await timeOperation(
    `Saved trials ${formatIndices(trials)}`,
    () => configuration.encoder.saveNewTrials(connection, experiment, trials),
    { experimentName: experiment.name, trialIndices: trials.map((trial) => trial.index) }
  );
}

export function saveNewTrial(
  experiment: Experiment,
  trial: Trial,
  configuration: StoreConfiguration
): Promise<void> {
  return saveNewTrials(experiment, [trial], configuration);
}

export async function saveUpdatedTrials(
  experiment: Experiment,
  trials: readonly Trial[],
  configuration: StoreConfiguration
): Promise<void> {
  assertNonEmpty(experiment, trials);
  const connection = await ensureConnection(configuration);
  await timeOperation(
    `Updated trials ${formatIndices(trials)}`,
    () => configuration.encoder.updateTrials(connection, experiment, trials),
    { experimentName: experiment.name, trialIndices: trials.map((trial) => trial.index) }
  );
}

export function saveUpdatedTrial(
  experiment: Experiment,
  trial: Trial,
  configuration: StoreConfiguration
): Promise<void> {
  return saveUpdatedTrials(experiment, [trial], configuration);
}
