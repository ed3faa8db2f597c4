/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration for the experiment database connection.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const CHECKPOINT_POLICIES = ['trust', 'strict'] as const;
export type CheckpointPolicy = (typeof CHECKPOINT_POLICIES)[number];

export interface StorageDatabaseConfig {
  url: string;
  maxConnections: number;
  checkpointPolicy: CheckpointPolicy;
}

const StorageDatabaseEnvSchema = z.object({
  EXPSYNC_DATABASE_URL: z
    .string({ required_error: 'EXPSYNC_DATABASE_URL environment variable is required' })
    .min(1, 'EXPSYNC_DATABASE_URL cannot be empty'),
  EXPSYNC_DB_MAX_CONNECTIONS: z.coerce.number().int().min(1).max(100).default(10),
  EXPSYNC_CHECKPOINT_POLICY: z.enum(CHECKPOINT_POLICIES).default('trust'),
});

/**
 * Load experiment database configuration from environment variables
 */
export function getStorageDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env
): StorageDatabaseConfig {
  const parsed = StorageDatabaseEnvSchema.safeParse({
    EXPSYNC_DATABASE_URL: env.EXPSYNC_DATABASE_URL,
    EXPSYNC_DB_MAX_CONNECTIONS: env.EXPSYNC_DB_MAX_CONNECTIONS || undefined,
    EXPSYNC_CHECKPOINT_POLICY: env.EXPSYNC_CHECKPOINT_POLICY || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const configKey = issue?.path.join('.');
    throw new ConfigurationError(issue?.message ?? 'Invalid storage configuration', configKey, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  return {
    url: parsed.data.EXPSYNC_DATABASE_URL,
    maxConnections: parsed.data.EXPSYNC_DB_MAX_CONNECTIONS,
    checkpointPolicy: parsed.data.EXPSYNC_CHECKPOINT_POLICY,
  };
}
