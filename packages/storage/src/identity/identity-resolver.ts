/**
 * Identity Resolver
 *
 * Maps an experiment name to durable ids. A missing entity resolves to
 * null; it is never an error here.
 */

import type { StoreConfiguration } from '../config/store-configuration.js';
import { ensureConnection } from '../connection/connection-manager.js';
import { timeOperation } from '../instrumentation.js';

export async function getExperimentId(
  experimentName: string,
  configuration: StoreConfiguration
): Promise<number | null> {
  const connection = await ensureConnection(configuration);
  return timeOperation(
    `Resolved id of experiment ${experimentName}`,
    () => configuration.decoder.findExperimentId(connection, experimentName),
    { experimentName }
  );
}

export async function getGenerationStrategyId(
  experimentName: string,
  configuration: StoreConfiguration
): Promise<number | null> {
  const connection = await ensureConnection(configuration);
  return timeOperation(
    `Resolved generation strategy id of experiment ${experimentName}`,
    () => configuration.decoder.findGenerationStrategyId(connection, experimentName),
    { experimentName }
  );
}
