/**
 * Tests for identity-resolver.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getExperimentId, getGenerationStrategyId } from '../../src/identity/identity-resolver.js';
import { saveExperiment } from '../../src/stores/experiment-store.js';
import { saveGenerationStrategy } from '../../src/stores/generation-strategy-store.js';
import { closeConnections } from '../../src/connection/connection-manager.js';
import type { StoreConfiguration } from '../../src/config/store-configuration.js';
import { InMemoryExperimentBackend, createTestConfiguration } from '../helpers/fakes.js';
import { buildExperiment, buildStrategy } from '../helpers/builders.js';

describe('Identity Resolver', () => {
  let configuration: StoreConfiguration;

  beforeEach(() => {
    configuration = createTestConfiguration(new InMemoryExperimentBackend());
  });

  afterEach(async () => {
    await closeConnections();
  });

  it('should resolve the id of a saved experiment', async () => {
    await saveExperiment(buildExperiment('exp1'), configuration);
    await saveExperiment(buildExperiment('exp2'), configuration);

    expect(await getExperimentId('exp1', configuration)).toBe(1);
    expect(await getExperimentId('exp2', configuration)).toBe(2);
  });

  it('should return null for an unknown experiment', async () => {
    expect(await getExperimentId('missing', configuration)).toBeNull();
  });

  it('should resolve the id of the strategy attached to an experiment', async () => {
    await saveExperiment(buildExperiment('exp1'), configuration);
    const strategy = buildStrategy(1, 'exp1');
    await saveGenerationStrategy(strategy, configuration);

    expect(await getGenerationStrategyId('exp1', configuration)).toBe(strategy.dbId);
  });

  it('should return null when no strategy is attached', async () => {
    await saveExperiment(buildExperiment('exp1'), configuration);

    expect(await getGenerationStrategyId('exp1', configuration)).toBeNull();
  });
});
