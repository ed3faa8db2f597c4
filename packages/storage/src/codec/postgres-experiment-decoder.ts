/**
 * Postgres Experiment Decoder
 *
 * Implements ExperimentDecoderPort over the expsync_* tables.
 */

import type {
  AnyExperiment,
  ExperimentDecoderPort,
  GenerationStrategy,
  StorageConnection,
} from '@expsync/core';
import { NotFoundError } from '@expsync/utils';
import {
  DataRowSchema,
  ExperimentRowSchema,
  GenerationStrategyRowSchema,
  GeneratorRunRowSchema,
  IdRowSchema,
  TABLES,
  TrialRowSchema,
} from './rows.js';
import { decodeExperiment, decodeGenerationStrategy, parseRow } from './row-codec.js';

export class PostgresExperimentDecoder implements ExperimentDecoderPort {
  async findExperimentId(connection: StorageConnection, experimentName: string): Promise<number | null> {
    const result = await connection.query(`SELECT id FROM ${TABLES.experiment} WHERE name = $1`, [
      experimentName,
    ]);
    const row = result.rows[0];
    return row ? parseRow(IdRowSchema, row, 'experiment').id : null;
  }

  async findGenerationStrategyId(
    connection: StorageConnection,
    experimentName: string
  ): Promise<number | null> {
    const result = await connection.query(
      `SELECT gs.id FROM ${TABLES.generationStrategy} gs
       JOIN ${TABLES.experiment} e ON e.id = gs.experiment_id
       WHERE e.name = $1`,
      [experimentName]
    );
    const row = result.rows[0];
    return row ? parseRow(IdRowSchema, row, 'generation_strategy').id : null;
  }

  async loadExperiment(connection: StorageConnection, experimentName: string): Promise<AnyExperiment> {
    const experimentResult = await connection.query(
      `SELECT id, name, kind, description, properties, evaluation_function_name, created_at
       FROM ${TABLES.experiment} WHERE name = $1`,
      [experimentName]
    );
    if (experimentResult.rows.length === 0) {
      throw new NotFoundError('Experiment', experimentName);
    }
    const experimentRow = parseRow(ExperimentRowSchema, experimentResult.rows[0], 'experiment');

    const trialResult = await connection.query(
      `SELECT trial_index, kind, status, arms, generator_run_id, run_metadata, created_at
       FROM ${TABLES.trial} WHERE experiment_id = $1 ORDER BY trial_index`,
      [experimentRow.id]
    );
    const dataResult = await connection.query(
      `SELECT trial_index, arm_name, metric_name, mean, sem
       FROM ${TABLES.data} WHERE experiment_id = $1 ORDER BY trial_index, id`,
      [experimentRow.id]
    );

    return decodeExperiment(
      experimentRow,
      trialResult.rows.map((row) => parseRow(TrialRowSchema, row, 'trial')),
      dataResult.rows.map((row) => parseRow(DataRowSchema, row, 'data'))
    );
  }

  async loadGenerationStrategyByExperimentName(
    connection: StorageConnection,
    experimentName: string
  ): Promise<GenerationStrategy | null> {
    const strategyResult = await connection.query(
      `SELECT gs.id, gs.name, gs.steps, e.name AS experiment_name
       FROM ${TABLES.generationStrategy} gs
       JOIN ${TABLES.experiment} e ON e.id = gs.experiment_id
       WHERE e.name = $1`,
      [experimentName]
    );
    if (strategyResult.rows.length === 0) {
      return null;
    }
    const strategyRow = parseRow(GenerationStrategyRowSchema, strategyResult.rows[0], 'generation_strategy');

    const runResult = await connection.query(
      `SELECT position, run_uuid, generator_key, arms, generation_step_index, created_at
       FROM ${TABLES.generatorRun} WHERE generation_strategy_id = $1 ORDER BY position`,
      [strategyRow.id]
    );

    return decodeGenerationStrategy(
      strategyRow,
      runResult.rows.map((row) => parseRow(GeneratorRunRowSchema, row, 'generator_run'))
    );
  }
}
