/**
 * @expsync/storage
 *
 * Synchronizes in-memory experiments, trials and generation strategies
 * with a durable store:
 * - identity resolution by experiment name
 * - whole-experiment load/save
 * - batched new/updated trial writes
 * - incremental generation strategy updates past a durable checkpoint
 */

// Configuration and connections
export {
  createStoreConfiguration,
  storeConfigurationFromEnv,
} from './config/store-configuration.js';
export type { StoreConfiguration, StoreConfigurationInput } from './config/store-configuration.js';
export {
  ConnectionManager,
  defaultConnectionManager,
  ensureConnection,
  closeConnections,
} from './connection/connection-manager.js';

// Store operations
export { getExperimentId, getGenerationStrategyId } from './identity/identity-resolver.js';
export {
  loadExperiment,
  saveExperiment,
  loadExperimentAndGenerationStrategy,
} from './stores/experiment-store.js';
export {
  findGenerationStrategyByExperiment,
  loadGenerationStrategyByExperiment,
  saveGenerationStrategy,
  updateGenerationStrategy,
} from './stores/generation-strategy-store.js';
export type { GenerationStrategyLookup } from './stores/generation-strategy-store.js';
export {
  saveNewTrial,
  saveNewTrials,
  saveUpdatedTrial,
  saveUpdatedTrials,
} from './stores/trial-store.js';
export { pendingGeneratorRuns } from '@expsync/core';
export { ExperimentStorage } from './experiment-storage.js';
export { timeOperation } from './instrumentation.js';

// Errors
export {
  UnsupportedExperimentVariantError,
  NoStrategyAttachedError,
  ConnectionError,
  EncodeDecodeError,
  CheckpointMismatchError,
} from './errors.js';

// Postgres reference implementation
export {
  PostgresConnection,
  postgresConnectionFactory,
  createPostgresConnection,
  redactTarget,
} from './postgres/postgres-client.js';
export type { PostgresConnectionOptions } from './postgres/postgres-client.js';
export { PostgresExperimentEncoder } from './codec/postgres-experiment-encoder.js';
export { PostgresExperimentDecoder } from './codec/postgres-experiment-decoder.js';
