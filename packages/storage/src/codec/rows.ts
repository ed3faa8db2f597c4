/**
 * Row schemas for the Postgres experiment tables.
 *
 * Rows are validated on the way in; pg hands back JSONB as parsed values
 * and TIMESTAMPTZ as Date.
 */

import { z } from 'zod';
import { TRIAL_STATUSES } from '@expsync/core';

export const TABLES = {
  experiment: 'expsync_experiment',
  trial: 'expsync_trial',
  data: 'expsync_data',
  generationStrategy: 'expsync_generation_strategy',
  generatorRun: 'expsync_generator_run',
} as const;

export const EXPERIMENT_COLUMNS = [
  'name',
  'kind',
  'description',
  'properties',
  'evaluation_function_name',
  'created_at',
] as const;

export const TRIAL_COLUMNS = [
  'experiment_id',
  'trial_index',
  'kind',
  'status',
  'arms',
  'generator_run_id',
  'run_metadata',
  'created_at',
] as const;

export const DATA_COLUMNS = [
  'experiment_id',
  'trial_index',
  'arm_name',
  'metric_name',
  'mean',
  'sem',
] as const;

export const GENERATION_STRATEGY_COLUMNS = ['name', 'experiment_id', 'steps'] as const;

export const GENERATOR_RUN_COLUMNS = [
  'generation_strategy_id',
  'position',
  'run_uuid',
  'generator_key',
  'arms',
  'generation_step_index',
  'created_at',
] as const;

const ArmSchema = z.object({
  name: z.string(),
  parameters: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])),
});

export const IdRowSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const ExperimentRowSchema = z.object({
  id: z.coerce.number().int().positive(),
  name: z.string().min(1),
  kind: z.enum(['experiment', 'simple_experiment']),
  description: z.string().nullable(),
  properties: z.record(z.string(), z.unknown()),
  evaluation_function_name: z.string().nullable(),
  created_at: z.coerce.date(),
});

export const TrialRowSchema = z.object({
  trial_index: z.coerce.number().int().nonnegative(),
  kind: z.enum(['trial', 'batch_trial']),
  status: z.enum(TRIAL_STATUSES),
  arms: z.array(ArmSchema),
  generator_run_id: z.string().nullable(),
  run_metadata: z.record(z.string(), z.unknown()).nullable(),
  created_at: z.coerce.date(),
});

export const DataRowSchema = z.object({
  trial_index: z.coerce.number().int().nonnegative(),
  arm_name: z.string(),
  metric_name: z.string(),
  mean: z.number(),
  sem: z.number().nullable(),
});

export const GenerationStrategyRowSchema = z.object({
  id: z.coerce.number().int().positive(),
  name: z.string().min(1),
  experiment_name: z.string().nullable(),
  steps: z.array(
    z.object({
      generatorKey: z.string(),
      numTrials: z.number().int(),
    })
  ),
});

export const GeneratorRunRowSchema = z.object({
  position: z.coerce.number().int().nonnegative(),
  run_uuid: z.string(),
  generator_key: z.string(),
  arms: z.array(ArmSchema),
  generation_step_index: z.number().int().nullable(),
  created_at: z.coerce.date(),
});

export type ExperimentRow = z.infer<typeof ExperimentRowSchema>;
export type TrialRow = z.infer<typeof TrialRowSchema>;
export type DataRow = z.infer<typeof DataRowSchema>;
export type GenerationStrategyRow = z.infer<typeof GenerationStrategyRowSchema>;
export type GeneratorRunRow = z.infer<typeof GeneratorRunRowSchema>;
