/**
 * Ports Barrel Export
 *
 * All port interfaces are exported from here.
 * Storage adapters implement these; the sync layer depends only on them.
 */

export type {
  StorageConnection,
  StorageExecutor,
  ConnectionFactory,
  QueryResultRows,
  QueryRow,
} from './storage-connection-port.js';
export type { ExperimentEncoderPort } from './experiment-encoder-port.js';
export type { ExperimentDecoderPort } from './experiment-decoder-port.js';
