/**
 * Experiment Domain Types
 *
 * Pure domain types for experiments and their trials.
 * These are plain data structures with no dependencies on storage or I/O.
 */

import type { DateTime } from 'luxon';

export type ParameterValue = string | number | boolean | null;

/**
 * Arm: one point in the search space
 */
export interface Arm {
  name: string;
  parameters: Record<string, ParameterValue>;
}

export const TRIAL_STATUSES = [
  'candidate',
  'staged',
  'running',
  'completed',
  'failed',
  'abandoned',
  'early_stopped',
] as const;

export type TrialStatus = (typeof TRIAL_STATUSES)[number];

interface TrialBase {
  /** Immutable, unique within the experiment, never reused */
  index: number;
  status: TrialStatus;
  createdAt: DateTime;
  /** Generator run that proposed the trial, when one did */
  generatorRunId?: string;
  runMetadata?: Record<string, unknown>;
}

/**
 * Single-arm trial
 */
export interface SingleArmTrial extends TrialBase {
  kind: 'trial';
  arm?: Arm;
}

/**
 * Batch (multi-arm) trial
 */
export interface BatchTrial extends TrialBase {
  kind: 'batch_trial';
  arms: Arm[];
}

export type Trial = SingleArmTrial | BatchTrial;

/**
 * One observed metric value for an arm of a trial
 */
export interface ObservationData {
  trialIndex: number;
  armName: string;
  metricName: string;
  mean: number;
  sem: number | null;
}

interface ExperimentBase {
  /** External key, unique across the store */
  name: string;
  description?: string;
  /** Creation order */
  trials: Trial[];
  /** Observation data attached to the experiment, for any of its trials */
  data: ObservationData[];
  properties: Record<string, unknown>;
  createdAt: DateTime;
}

/**
 * Full experiment; the only variant the storage layer supports
 */
export interface Experiment extends ExperimentBase {
  kind: 'experiment';
}

/**
 * Lightweight experiment variant that evaluates through a local function.
 * Exists in the model but is never loaded by the storage layer.
 */
export interface SimpleExperiment extends ExperimentBase {
  kind: 'simple_experiment';
  evaluationFunctionName: string;
}

export type AnyExperiment = Experiment | SimpleExperiment;
