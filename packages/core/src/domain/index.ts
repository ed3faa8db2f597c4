/**
 * Domain Barrel Export
 */

export type {
  Arm,
  ParameterValue,
  TrialStatus,
  SingleArmTrial,
  BatchTrial,
  Trial,
  ObservationData,
  Experiment,
  SimpleExperiment,
  AnyExperiment,
} from './experiments/types.js';
export { TRIAL_STATUSES } from './experiments/types.js';
export {
  createExperiment,
  isFullExperiment,
  nextTrialIndex,
  addTrial,
  getTrial,
  trialArms,
  attachData,
  getTrialData,
} from './experiments/experiment.js';
export type { CreateExperimentInput, NewTrialOptions } from './experiments/experiment.js';

export type { GeneratorRun, GenerationStep, GenerationStrategy } from './generation/types.js';
export {
  createGenerationStrategy,
  recordGeneratorRun,
  pendingGeneratorRuns,
  isPendingSuffix,
  advanceCheckpoint,
} from './generation/generation-strategy.js';
export type {
  CreateGenerationStrategyInput,
  RecordGeneratorRunInput,
} from './generation/generation-strategy.js';
