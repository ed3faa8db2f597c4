/**
 * PostgreSQL connection
 *
 * Default ConnectionFactory: one pg Pool per connection target.
 * The pool connects lazily, on the first query.
 */

import pg from 'pg';
import type { Pool as PgPool, PoolClient } from 'pg';
import type { QueryResultRows, QueryRow, StorageConnection, StorageExecutor } from '@expsync/core';
import { logger } from '../logger.js';
import { ConnectionError } from '../errors.js';

const { Pool } = pg;

export interface PostgresConnectionOptions {
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Hide the password of a connection URL before it reaches a log line
 */
export function redactTarget(target: string): string {
  try {
    const url = new URL(target);
    if (url.password) {
      url.password = '***';
    }
    return url.toString();
  } catch {
    return '<invalid target>';
  }
}

function assertPostgresTarget(target: string): void {
  let protocol: string;
  try {
    protocol = new URL(target).protocol;
  } catch (error) {
    throw new ConnectionError('Connection target is not a valid URL', undefined, error);
  }
  if (protocol !== 'postgres:' && protocol !== 'postgresql:') {
    throw new ConnectionError(
      `Unsupported connection protocol '${protocol}', expected postgres: or postgresql:`,
      redactTarget(target)
    );
  }
}

class ClientExecutor implements StorageExecutor {
  constructor(private readonly client: PoolClient) {}

  async query(text: string, params?: readonly unknown[]): Promise<QueryResultRows> {
    const result = await this.client.query<QueryRow>(text, params ? [...params] : undefined);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }
}

export class PostgresConnection implements StorageConnection {
  public readonly target: string;
  private readonly pool: PgPool;

  constructor(target: string, options: PostgresConnectionOptions = {}) {
    assertPostgresTarget(target);
    this.target = target;

    this.pool = new Pool({
      connectionString: target,
      max: options.maxConnections ?? 10,
      idleTimeoutMillis: options.idleTimeoutMillis ?? 30_000,
      connectionTimeoutMillis: options.connectionTimeoutMillis ?? 10_000,
    });

    this.pool.on('error', (error: Error) => {
      logger.error('Postgres pool error', error, { target: redactTarget(target) });
    });

    logger.info('Postgres pool created', { target: redactTarget(target) });
  }

  async query(text: string, params?: readonly unknown[]): Promise<QueryResultRows> {
    const result = await this.pool.query<QueryRow>(text, params ? [...params] : undefined);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  async transaction<T>(work: (executor: StorageExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await work(new ClientExecutor(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error('Postgres rollback failed', rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('Postgres pool closed', { target: redactTarget(this.target) });
  }
}

/**
 * Build a ConnectionFactory with fixed pool options
 */
export function postgresConnectionFactory(options: PostgresConnectionOptions = {}) {
  return (target: string): StorageConnection => new PostgresConnection(target, options);
}

export const createPostgresConnection = postgresConnectionFactory();
