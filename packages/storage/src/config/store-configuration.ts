/**
 * Store Configuration
 *
 * Immutable bundle of connection factory, connection target and the
 * encode/decode collaborators used by every store operation.
 */

import type { ConnectionFactory, ExperimentDecoderPort, ExperimentEncoderPort } from '@expsync/core';
import { ConfigurationError, getStorageDatabaseConfig } from '@expsync/utils';
import type { CheckpointPolicy } from '@expsync/utils';
import { postgresConnectionFactory } from '../postgres/postgres-client.js';
import { PostgresExperimentEncoder } from '../codec/postgres-experiment-encoder.js';
import { PostgresExperimentDecoder } from '../codec/postgres-experiment-decoder.js';

export interface StoreConfiguration {
  /** Custom constructor for the connection; the Postgres pool factory when absent */
  readonly connectionFactory?: ConnectionFactory;
  readonly target: string;
  readonly encoder: ExperimentEncoderPort;
  readonly decoder: ExperimentDecoderPort;
  /**
   * 'trust' persists whatever runs the caller hands to an update;
   * 'strict' first checks they are exactly the pending suffix.
   */
  readonly checkpointPolicy: CheckpointPolicy;
}

export interface StoreConfigurationInput {
  connectionFactory?: ConnectionFactory;
  target: string;
  encoder: ExperimentEncoderPort;
  decoder: ExperimentDecoderPort;
  checkpointPolicy?: CheckpointPolicy;
}

export function createStoreConfiguration(input: StoreConfigurationInput): StoreConfiguration {
  if (!input.target || input.target.trim().length === 0) {
    throw new ConfigurationError('Store configuration needs a connection target', 'target');
  }
  return Object.freeze({
    connectionFactory: input.connectionFactory,
    target: input.target,
    encoder: input.encoder,
    decoder: input.decoder,
    checkpointPolicy: input.checkpointPolicy ?? 'trust',
  });
}

// One factory per pool size, so repeated env configurations share a connection
const envConnectionFactories = new Map<number, ConnectionFactory>();

function envConnectionFactory(maxConnections: number): ConnectionFactory {
  let factory = envConnectionFactories.get(maxConnections);
  if (!factory) {
    factory = postgresConnectionFactory({ maxConnections });
    envConnectionFactories.set(maxConnections, factory);
  }
  return factory;
}

/**
 * Build a configuration from EXPSYNC_* environment variables, backed by the
 * Postgres encoder/decoder unless others are given.
 */
export function storeConfigurationFromEnv(
  overrides: Partial<Pick<StoreConfigurationInput, 'encoder' | 'decoder' | 'connectionFactory'>> = {},
  env: NodeJS.ProcessEnv = process.env
): StoreConfiguration {
  const databaseConfig = getStorageDatabaseConfig(env);
  return createStoreConfiguration({
    target: databaseConfig.url,
    connectionFactory:
      overrides.connectionFactory ?? envConnectionFactory(databaseConfig.maxConnections),
    encoder: overrides.encoder ?? new PostgresExperimentEncoder(),
    decoder: overrides.decoder ?? new PostgresExperimentDecoder(),
    checkpointPolicy: databaseConfig.checkpointPolicy,
  });
}
