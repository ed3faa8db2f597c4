/**
 * Connection Initializer
 *
 * Keeps one connection handle per (target, factory) pair. `ensure` is
 * idempotent: the same target and factory always yield the same handle, so
 * stores can call it before every operation. Handles are only closed by
 * `closeAll`.
 */

import type { ConnectionFactory, StorageConnection } from '@expsync/core';
import { logger } from '../logger.js';
import { createPostgresConnection, redactTarget } from '../postgres/postgres-client.js';
import type { StoreConfiguration } from '../config/store-configuration.js';

export class ConnectionManager {
  /** target -> factory -> handle */
  private readonly connections = new Map<string, Map<ConnectionFactory, StorageConnection>>();

  async ensure(configuration: StoreConfiguration): Promise<StorageConnection> {
    const factory = configuration.connectionFactory ?? createPostgresConnection;
    let byFactory = this.connections.get(configuration.target);
    const existing = byFactory?.get(factory);
    if (existing) {
      return existing;
    }

    const connection = factory(configuration.target);
    if (!byFactory) {
      byFactory = new Map<ConnectionFactory, StorageConnection>();
      this.connections.set(configuration.target, byFactory);
    }
    byFactory.set(factory, connection);
    logger.debug('Storage connection initialized', {
      target: redactTarget(configuration.target),
      handlesForTarget: byFactory.size,
    });
    return connection;
  }

  has(target: string): boolean {
    return this.connections.has(target);
  }

  /** Number of open handles across all targets */
  get size(): number {
    let count = 0;
    for (const byFactory of this.connections.values()) {
      count += byFactory.size;
    }
    return count;
  }

  /**
   * Close every handle. All closes are attempted; the first failure is
   * rethrown afterwards.
   */
  async closeAll(): Promise<void> {
    const connections = [...this.connections.values()].flatMap((byFactory) => [...byFactory.values()]);
    this.connections.clear();

    const results = await Promise.allSettled(connections.map((connection) => connection.close()));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      logger.error('Closing storage connections failed', failure.reason, {
        failedCount: results.filter((result) => result.status === 'rejected').length,
      });
      throw failure.reason;
    }
  }
}

export const defaultConnectionManager = new ConnectionManager();

/**
 * Ensure the connection described by `configuration` exists and return it
 */
export function ensureConnection(configuration: StoreConfiguration): Promise<StorageConnection> {
  return defaultConnectionManager.ensure(configuration);
}

/**
 * Close every connection opened through `ensureConnection`
 */
export function closeConnections(): Promise<void> {
  return defaultConnectionManager.closeAll();
}
