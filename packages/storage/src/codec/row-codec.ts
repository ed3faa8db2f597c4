/**
 * Row codec
 *
 * Pure mapping between domain objects and rows of the experiment tables.
 * Encoders return values in the column order declared in ./rows.
 */

import { DateTime } from 'luxon';
import type { z } from 'zod';
import type {
  AnyExperiment,
  Arm,
  GenerationStrategy,
  GeneratorRun,
  ObservationData,
  Trial,
} from '@expsync/core';
import { trialArms } from '@expsync/core';
import { EncodeDecodeError } from '../errors.js';
import type {
  DataRow,
  ExperimentRow,
  GenerationStrategyRow,
  GeneratorRunRow,
  TrialRow,
} from './rows.js';

/**
 * Validate one row against its schema
 *
 * @throws EncodeDecodeError carrying the zod error as cause
 */
export function parseRow<S extends z.ZodTypeAny>(schema: S, row: unknown, entity: string): z.infer<S> {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EncodeDecodeError(
      `Invalid ${entity} row: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`,
      entity,
      undefined,
      parsed.error
    );
  }
  return parsed.data;
}

function toJson(value: unknown, entity: string): string {
  try {
    return JSON.stringify(value);
  } catch (error) {
    throw new EncodeDecodeError(`Cannot serialize ${entity} payload`, entity, undefined, error);
  }
}

function toTimestamp(value: DateTime, entity: string): string {
  const iso = value.toUTC().toISO();
  if (!iso) {
    throw new EncodeDecodeError(
      `Invalid ${entity} timestamp: ${value.invalidReason ?? 'unknown reason'}`,
      entity
    );
  }
  return iso;
}

function fromTimestamp(value: Date): DateTime {
  return DateTime.fromJSDate(value, { zone: 'utc' });
}

function copyArms(arms: readonly Arm[]): Arm[] {
  return arms.map((arm) => ({ name: arm.name, parameters: { ...arm.parameters } }));
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function encodeExperimentRow(experiment: AnyExperiment): unknown[] {
  return [
    experiment.name,
    experiment.kind,
    experiment.description ?? null,
    toJson(experiment.properties, 'experiment'),
    experiment.kind === 'simple_experiment' ? experiment.evaluationFunctionName : null,
    toTimestamp(experiment.createdAt, 'experiment'),
  ];
}

export function encodeTrialRow(experimentId: number, trial: Trial): unknown[] {
  return [
    experimentId,
    trial.index,
    trial.kind,
    trial.status,
    toJson(trialArms(trial), 'trial'),
    trial.generatorRunId ?? null,
    trial.runMetadata === undefined ? null : toJson(trial.runMetadata, 'trial'),
    toTimestamp(trial.createdAt, 'trial'),
  ];
}

export function encodeDataRow(experimentId: number, record: ObservationData): unknown[] {
  if (!Number.isFinite(record.mean)) {
    throw new EncodeDecodeError(
      `Observation mean for metric ${record.metricName} of trial ${record.trialIndex} is not finite`,
      'data',
      { trialIndex: record.trialIndex, metricName: record.metricName }
    );
  }
  if (record.sem !== null && !Number.isFinite(record.sem)) {
    throw new EncodeDecodeError(
      `Observation sem for metric ${record.metricName} of trial ${record.trialIndex} is not finite`,
      'data',
      { trialIndex: record.trialIndex, metricName: record.metricName }
    );
  }
  return [
    experimentId,
    record.trialIndex,
    record.armName,
    record.metricName,
    record.mean,
    record.sem,
  ];
}

export function encodeGenerationStrategyRow(
  strategy: GenerationStrategy,
  experimentId: number | null
): unknown[] {
  return [strategy.name, experimentId, toJson(strategy.steps, 'generation_strategy')];
}

export function encodeGeneratorRunRow(
  generationStrategyId: number,
  position: number,
  run: GeneratorRun
): unknown[] {
  return [
    generationStrategyId,
    position,
    run.id,
    run.generatorKey,
    toJson(run.arms, 'generator_run'),
    run.generationStepIndex ?? null,
    toTimestamp(run.createdAt, 'generator_run'),
  ];
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export function decodeTrial(row: TrialRow): Trial {
  const base = {
    index: row.trial_index,
    status: row.status,
    createdAt: fromTimestamp(row.created_at),
    ...(row.generator_run_id !== null ? { generatorRunId: row.generator_run_id } : {}),
    ...(row.run_metadata !== null ? { runMetadata: row.run_metadata } : {}),
  };

  if (row.kind === 'batch_trial') {
    return { ...base, kind: 'batch_trial', arms: copyArms(row.arms) };
  }
  if (row.arms.length > 1) {
    throw new EncodeDecodeError(
      `Single-arm trial ${row.trial_index} was stored with ${row.arms.length} arms`,
      'trial',
      { trialIndex: row.trial_index }
    );
  }
  const [arm] = copyArms(row.arms);
  return arm ? { ...base, kind: 'trial', arm } : { ...base, kind: 'trial' };
}

export function decodeData(row: DataRow): ObservationData {
  return {
    trialIndex: row.trial_index,
    armName: row.arm_name,
    metricName: row.metric_name,
    mean: row.mean,
    sem: row.sem,
  };
}

export function decodeExperiment(
  row: ExperimentRow,
  trialRows: readonly TrialRow[],
  dataRows: readonly DataRow[]
): AnyExperiment {
  const base = {
    name: row.name,
    trials: [...trialRows].sort((a, b) => a.trial_index - b.trial_index).map(decodeTrial),
    data: dataRows.map(decodeData),
    properties: row.properties,
    createdAt: fromTimestamp(row.created_at),
    ...(row.description !== null ? { description: row.description } : {}),
  };

  if (row.kind === 'simple_experiment') {
    if (row.evaluation_function_name === null) {
      throw new EncodeDecodeError(
        `Simple experiment ${row.name} was stored without an evaluation function`,
        'experiment',
        { experimentName: row.name }
      );
    }
    return {
      ...base,
      kind: 'simple_experiment',
      evaluationFunctionName: row.evaluation_function_name,
    };
  }
  return { ...base, kind: 'experiment' };
}

export function decodeGeneratorRun(row: GeneratorRunRow): GeneratorRun {
  return {
    id: row.run_uuid,
    generatorKey: row.generator_key,
    arms: copyArms(row.arms),
    createdAt: fromTimestamp(row.created_at),
    ...(row.generation_step_index !== null ? { generationStepIndex: row.generation_step_index } : {}),
  };
}

/**
 * The decoded strategy's checkpoint sits at its durable run count
 */
export function decodeGenerationStrategy(
  row: GenerationStrategyRow,
  runRows: readonly GeneratorRunRow[]
): GenerationStrategy {
  const ordered = [...runRows].sort((a, b) => a.position - b.position);
  ordered.forEach((runRow, i) => {
    if (runRow.position !== i) {
      throw new EncodeDecodeError(
        `Generator runs of strategy ${row.name} have a gap at position ${i}`,
        'generator_run',
        { strategyName: row.name, position: i }
      );
    }
  });

  return {
    name: row.name,
    steps: row.steps,
    generatorRuns: ordered.map(decodeGeneratorRun),
    persistedRunCount: ordered.length,
    dbId: row.id,
    ...(row.experiment_name !== null ? { experimentName: row.experiment_name } : {}),
  };
}
