/**
 * Postgres Experiment Encoder
 *
 * Implements ExperimentEncoderPort over the expsync_* tables. Every method
 * is one transaction; batches larger than the bind parameter limit span
 * several statements inside it.
 */

import type {
  Experiment,
  ExperimentEncoderPort,
  GenerationStrategy,
  GeneratorRun,
  StorageConnection,
  StorageExecutor,
  Trial,
} from '@expsync/core';
import { getTrialData } from '@expsync/core';
import { LogHelpers, NotFoundError } from '@expsync/utils';
import { logger } from '../logger.js';
import {
  MAX_BIND_PARAMETERS,
  buildChunkedInserts,
  buildMultiRowInsert,
  buildPlaceholderList,
} from '../utils/query-builder.js';
import {
  DATA_COLUMNS,
  EXPERIMENT_COLUMNS,
  GENERATION_STRATEGY_COLUMNS,
  GENERATOR_RUN_COLUMNS,
  IdRowSchema,
  TABLES,
  TRIAL_COLUMNS,
} from './rows.js';
import {
  encodeDataRow,
  encodeExperimentRow,
  encodeGenerationStrategyRow,
  encodeGeneratorRunRow,
  encodeTrialRow,
  parseRow,
} from './row-codec.js';

const TRIAL_UPSERT = `ON CONFLICT (experiment_id, trial_index) DO UPDATE SET
  kind = EXCLUDED.kind,
  status = EXCLUDED.status,
  arms = EXCLUDED.arms,
  generator_run_id = EXCLUDED.generator_run_id,
  run_metadata = EXCLUDED.run_metadata`;

const EXPERIMENT_UPSERT = `ON CONFLICT (name) DO UPDATE SET
  kind = EXCLUDED.kind,
  description = EXCLUDED.description,
  properties = EXCLUDED.properties,
  evaluation_function_name = EXCLUDED.evaluation_function_name
RETURNING id`;

async function requireExperimentId(executor: StorageExecutor, experimentName: string): Promise<number> {
  const result = await executor.query(`SELECT id FROM ${TABLES.experiment} WHERE name = $1`, [
    experimentName,
  ]);
  const row = result.rows[0];
  if (!row) {
    throw new NotFoundError('Experiment', experimentName);
  }
  return parseRow(IdRowSchema, row, 'experiment').id;
}

async function insertRows(
  executor: StorageExecutor,
  table: string,
  columns: readonly string[],
  rows: ReadonlyArray<readonly unknown[]>,
  suffix?: string
): Promise<void> {
  for (const { text, params } of buildChunkedInserts(table, columns, rows, suffix)) {
    await executor.query(text, params);
  }
}

async function insertData(
  executor: StorageExecutor,
  experimentId: number,
  experiment: Experiment,
  trials: readonly Trial[]
): Promise<number> {
  const rows = trials.flatMap((trial) =>
    getTrialData(experiment, trial.index).map((record) => encodeDataRow(experimentId, record))
  );
  if (rows.length === 0) {
    return 0;
  }
  await insertRows(executor, TABLES.data, DATA_COLUMNS, rows);
  return rows.length;
}

export class PostgresExperimentEncoder implements ExperimentEncoderPort {
  async saveExperiment(connection: StorageConnection, experiment: Experiment): Promise<number> {
    const startTime = Date.now();

    const experimentId = await connection.transaction(async (executor) => {
      const upsert = buildMultiRowInsert(
        TABLES.experiment,
        EXPERIMENT_COLUMNS,
        [encodeExperimentRow(experiment)],
        EXPERIMENT_UPSERT
      );
      const result = await executor.query(upsert.text, upsert.params);
      const id = parseRow(IdRowSchema, result.rows[0], 'experiment').id;

      if (experiment.trials.length > 0) {
        await insertRows(
          executor,
          TABLES.trial,
          TRIAL_COLUMNS,
          experiment.trials.map((trial) => encodeTrialRow(id, trial)),
          TRIAL_UPSERT
        );
      }

      // Attached data is replaced as a whole
      await executor.query(`DELETE FROM ${TABLES.data} WHERE experiment_id = $1`, [id]);
      await insertData(executor, id, experiment, experiment.trials);
      return id;
    });

    LogHelpers.dbQuery(logger, 'upsert', TABLES.experiment, Date.now() - startTime, {
      experimentName: experiment.name,
      trialCount: experiment.trials.length,
    });
    return experimentId;
  }

  async saveNewTrials(
    connection: StorageConnection,
    experiment: Experiment,
    trials: readonly Trial[]
  ): Promise<void> {
    if (trials.length === 0) {
      return;
    }

    await connection.transaction(async (executor) => {
      const experimentId = await requireExperimentId(executor, experiment.name);
      // Plain insert: an index that already exists fails on the unique key
      await insertRows(
        executor,
        TABLES.trial,
        TRIAL_COLUMNS,
        trials.map((trial) => encodeTrialRow(experimentId, trial))
      );
      await insertData(executor, experimentId, experiment, trials);
    });
  }

  async updateTrials(
    connection: StorageConnection,
    experiment: Experiment,
    trials: readonly Trial[]
  ): Promise<void> {
    if (trials.length === 0) {
      return;
    }

    await connection.transaction(async (executor) => {
      const experimentId = await requireExperimentId(executor, experiment.name);

      for (const trial of trials) {
        const [, , kind, status, arms, generatorRunId, runMetadata] = encodeTrialRow(experimentId, trial);
        const result = await executor.query(
          `UPDATE ${TABLES.trial}
           SET kind = $3, status = $4, arms = $5, generator_run_id = $6, run_metadata = $7
           WHERE experiment_id = $1 AND trial_index = $2`,
          [experimentId, trial.index, kind, status, arms, generatorRunId, runMetadata]
        );
        if (result.rowCount === 0) {
          throw new NotFoundError('Trial', String(trial.index), { experimentName: experiment.name });
        }
      }

      const indices = trials.map((trial) => trial.index);
      // $1 is the experiment id
      const indicesPerStatement = MAX_BIND_PARAMETERS - 1;
      for (let start = 0; start < indices.length; start += indicesPerStatement) {
        const chunk = indices.slice(start, start + indicesPerStatement);
        await executor.query(
          `DELETE FROM ${TABLES.data} WHERE experiment_id = $1 AND trial_index IN (${buildPlaceholderList(
            chunk.length,
            2
          )})`,
          [experimentId, ...chunk]
        );
      }
      await insertData(executor, experimentId, experiment, trials);
    });
  }

  async saveGenerationStrategy(
    connection: StorageConnection,
    strategy: GenerationStrategy
  ): Promise<number> {
    return connection.transaction(async (executor) => {
      const experimentId =
        strategy.experimentName === undefined
          ? null
          : await requireExperimentId(executor, strategy.experimentName);

      const insert = buildMultiRowInsert(
        TABLES.generationStrategy,
        GENERATION_STRATEGY_COLUMNS,
        [encodeGenerationStrategyRow(strategy, experimentId)],
        'RETURNING id'
      );
      const result = await executor.query(insert.text, insert.params);
      const strategyId = parseRow(IdRowSchema, result.rows[0], 'generation_strategy').id;

      await this.insertRuns(executor, strategyId, 0, strategy.generatorRuns);
      return strategyId;
    });
  }

  async appendGeneratorRuns(
    connection: StorageConnection,
    strategy: GenerationStrategy,
    runs: readonly GeneratorRun[]
  ): Promise<void> {
    if (runs.length === 0) {
      return;
    }

    await connection.transaction(async (executor) => {
      const strategyId = strategy.dbId ?? (await this.findStrategyId(executor, strategy));
      await this.insertRuns(executor, strategyId, strategy.persistedRunCount, runs);
    });
  }

  private async findStrategyId(executor: StorageExecutor, strategy: GenerationStrategy): Promise<number> {
    if (strategy.experimentName !== undefined) {
      const result = await executor.query(
        `SELECT gs.id FROM ${TABLES.generationStrategy} gs
         JOIN ${TABLES.experiment} e ON e.id = gs.experiment_id
         WHERE e.name = $1`,
        [strategy.experimentName]
      );
      const row = result.rows[0];
      if (row) {
        return parseRow(IdRowSchema, row, 'generation_strategy').id;
      }
    }
    throw new NotFoundError('Generation strategy', strategy.name, {
      experimentName: strategy.experimentName,
    });
  }

  private async insertRuns(
    executor: StorageExecutor,
    strategyId: number,
    firstPosition: number,
    runs: readonly GeneratorRun[]
  ): Promise<void> {
    if (runs.length === 0) {
      return;
    }
    await insertRows(
      executor,
      TABLES.generatorRun,
      GENERATOR_RUN_COLUMNS,
      runs.map((run, i) => encodeGeneratorRunRow(strategyId, firstPosition + i, run))
    );
  }
}
