/**
 * Experiment helpers
 */

import { DateTime } from 'luxon';
import { ValidationError } from '../../errors.js';
import type { AnyExperiment, Arm, Experiment, ObservationData, Trial, TrialStatus } from './types.js';

export interface CreateExperimentInput {
  name: string;
  description?: string;
  properties?: Record<string, unknown>;
  createdAt?: DateTime;
}

export function createExperiment(input: CreateExperimentInput): Experiment {
  if (!input.name || input.name.trim().length === 0) {
    throw new ValidationError('Experiment name cannot be empty');
  }
  return {
    kind: 'experiment',
    name: input.name,
    description: input.description,
    trials: [],
    data: [],
    properties: input.properties ?? {},
    createdAt: input.createdAt ?? DateTime.utc(),
  };
}

export function isFullExperiment(experiment: AnyExperiment): experiment is Experiment {
  return experiment.kind === 'experiment';
}

/**
 * Next free trial index. Trials are kept in creation order and indices are
 * never reused, so this is one past the index of the last trial.
 */
export function nextTrialIndex(experiment: AnyExperiment): number {
  const last = experiment.trials.at(-1);
  return last ? last.index + 1 : 0;
}

export interface NewTrialOptions {
  generatorRunId?: string;
  status?: TrialStatus;
  createdAt?: DateTime;
}

/**
 * Append a single-arm trial (or a batch trial when given several arms)
 */
export function addTrial(experiment: AnyExperiment, arms: Arm[], options: NewTrialOptions = {}): Trial {
  const base = {
    index: nextTrialIndex(experiment),
    status: options.status ?? 'candidate',
    createdAt: options.createdAt ?? DateTime.utc(),
    generatorRunId: options.generatorRunId,
  };
  const trial: Trial =
    arms.length > 1 ? { ...base, kind: 'batch_trial', arms } : { ...base, kind: 'trial', arm: arms[0] };
  experiment.trials.push(trial);
  return trial;
}

export function getTrial(experiment: AnyExperiment, index: number): Trial | undefined {
  return experiment.trials.find((trial) => trial.index === index);
}

export function trialArms(trial: Trial): Arm[] {
  if (trial.kind === 'batch_trial') {
    return trial.arms;
  }
  return trial.arm ? [trial.arm] : [];
}

/**
 * Attach observation data to an experiment. Every record must point at a
 * trial the experiment owns.
 */
export function attachData(experiment: AnyExperiment, records: ObservationData[]): void {
  for (const record of records) {
    if (!getTrial(experiment, record.trialIndex)) {
      throw new ValidationError(
        `Cannot attach data for trial ${record.trialIndex}: no such trial on experiment ${experiment.name}`,
        { experimentName: experiment.name, trialIndex: record.trialIndex }
      );
    }
  }
  experiment.data.push(...records);
}

/**
 * Observation data attached to the experiment for one trial
 */
export function getTrialData(experiment: AnyExperiment, trialIndex: number): ObservationData[] {
  return experiment.data.filter((record) => record.trialIndex === trialIndex);
}
