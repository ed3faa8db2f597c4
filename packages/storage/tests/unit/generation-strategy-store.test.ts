/**
 * Tests for generation-strategy-store.ts
 *
 * Tests cover:
 * - First save of a strategy and its checkpoint
 * - Incremental updates past the checkpoint
 * - Trust and strict checkpoint policies
 * - Lookup with and without an attached strategy
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { pendingGeneratorRuns } from '@expsync/core';
import {
  findGenerationStrategyByExperiment,
  loadGenerationStrategyByExperiment,
  saveGenerationStrategy,
  updateGenerationStrategy,
} from '../../src/stores/generation-strategy-store.js';
import { saveExperiment } from '../../src/stores/experiment-store.js';
import { closeConnections } from '../../src/connection/connection-manager.js';
import { CheckpointMismatchError, NoStrategyAttachedError } from '../../src/errors.js';
import { logger } from '../../src/logger.js';
import type { StoreConfiguration } from '../../src/config/store-configuration.js';
import { FakeConnection, InMemoryExperimentBackend, createTestConfiguration } from '../helpers/fakes.js';
import { buildExperiment, buildStrategy, recordRuns } from '../helpers/builders.js';

describe('Generation Strategy Store', () => {
  let backend: InMemoryExperimentBackend;
  let configuration: StoreConfiguration;

  beforeEach(async () => {
    backend = new InMemoryExperimentBackend();
    configuration = createTestConfiguration(backend);
    await saveExperiment(buildExperiment('exp1'), configuration);
  });

  afterEach(async () => {
    await closeConnections();
  });

  describe('saveGenerationStrategy', () => {
    it('should persist the full history and move the checkpoint to its end', async () => {
      const strategy = buildStrategy(3);

      await saveGenerationStrategy(strategy, configuration);

      expect(strategy.persistedRunCount).toBe(3);
      expect(strategy.dbId).toBe(await backend.findGenerationStrategyId(new FakeConnection(), 'exp1'));
      expect(backend.storedRunCount('exp1')).toBe(3);
    });

    it('should save a strategy without runs', async () => {
      const strategy = buildStrategy(0);

      await saveGenerationStrategy(strategy, configuration);

      expect(strategy.persistedRunCount).toBe(0);
      expect(backend.storedRunCount('exp1')).toBe(0);
    });

    it('should log the save duration', async () => {
      const debugSpy = vi.spyOn(logger, 'debug');

      await saveGenerationStrategy(buildStrategy(1), configuration);

      expect(debugSpy).toHaveBeenCalledWith(
        expect.stringMatching(/^Saved generation strategy sobol\+gpei in \d+\.\d{2} seconds\.$/),
        expect.objectContaining({ strategyName: 'sobol+gpei' })
      );
    });
  });

  describe('updateGenerationStrategy', () => {
    it('should persist only the runs past the checkpoint and advance it', async () => {
      const strategy = buildStrategy(3);
      await saveGenerationStrategy(strategy, configuration);
      recordRuns(strategy, 2);
      const newRuns = pendingGeneratorRuns(strategy);
      const appendSpy = vi.spyOn(backend, 'appendGeneratorRuns');

      await updateGenerationStrategy(strategy, newRuns, configuration);

      expect(strategy.persistedRunCount).toBe(5);
      expect(backend.storedRunCount('exp1')).toBe(5);
      expect(appendSpy).toHaveBeenCalledTimes(1);
      const appended = appendSpy.mock.calls[0][2];
      expect(appended.map((run) => run.id)).toEqual(['run-3', 'run-4']);
    });

    it('should hand the encoder the strategy with its checkpoint still at the old position', async () => {
      const strategy = buildStrategy(3);
      await saveGenerationStrategy(strategy, configuration);
      recordRuns(strategy, 2);
      const checkpoints: number[] = [];
      vi.spyOn(backend, 'appendGeneratorRuns').mockImplementation(async (_connection, s) => {
        checkpoints.push(s.persistedRunCount);
      });

      await updateGenerationStrategy(strategy, pendingGeneratorRuns(strategy), configuration);

      expect(checkpoints).toEqual([3]);
    });

    it('should be a no-op for an empty run list', async () => {
      const strategy = buildStrategy(3);
      await saveGenerationStrategy(strategy, configuration);
      const appendSpy = vi.spyOn(backend, 'appendGeneratorRuns');

      await updateGenerationStrategy(strategy, [], configuration);

      expect(appendSpy).not.toHaveBeenCalled();
      expect(strategy.persistedRunCount).toBe(3);
      expect(backend.storedRunCount('exp1')).toBe(3);
    });

    it('should not detect the same runs sent twice under the trust policy', async () => {
      const strategy = buildStrategy(3);
      await saveGenerationStrategy(strategy, configuration);
      recordRuns(strategy, 2);
      const newRuns = pendingGeneratorRuns(strategy);

      await updateGenerationStrategy(strategy, newRuns, configuration);
      await updateGenerationStrategy(strategy, newRuns, configuration);

      expect(strategy.persistedRunCount).toBe(7);
      expect(backend.storedRunCount('exp1')).toBe(7);
    });

    it('should leave the checkpoint untouched when the encoder fails', async () => {
      const strategy = buildStrategy(3);
      await saveGenerationStrategy(strategy, configuration);
      recordRuns(strategy, 2);
      vi.spyOn(backend, 'appendGeneratorRuns').mockRejectedValue(new Error('write failed'));

      await expect(
        updateGenerationStrategy(strategy, pendingGeneratorRuns(strategy), configuration)
      ).rejects.toThrow('write failed');

      expect(strategy.persistedRunCount).toBe(3);
    });

    describe('strict checkpoint policy', () => {
      let strictConfiguration: StoreConfiguration;

      beforeEach(() => {
        strictConfiguration = createTestConfiguration(backend, undefined, { checkpointPolicy: 'strict' });
      });

      it('should accept exactly the pending suffix', async () => {
        const strategy = buildStrategy(3);
        await saveGenerationStrategy(strategy, strictConfiguration);
        recordRuns(strategy, 2);

        await updateGenerationStrategy(strategy, pendingGeneratorRuns(strategy), strictConfiguration);

        expect(strategy.persistedRunCount).toBe(5);
      });

      it('should reject runs that were already persisted', async () => {
        const strategy = buildStrategy(3);
        await saveGenerationStrategy(strategy, strictConfiguration);
        recordRuns(strategy, 2);
        const newRuns = pendingGeneratorRuns(strategy);
        await updateGenerationStrategy(strategy, newRuns, strictConfiguration);
        const appendSpy = vi.spyOn(backend, 'appendGeneratorRuns');

        await expect(
          updateGenerationStrategy(strategy, newRuns, strictConfiguration)
        ).rejects.toBeInstanceOf(CheckpointMismatchError);

        expect(appendSpy).not.toHaveBeenCalled();
        expect(strategy.persistedRunCount).toBe(5);
      });

      it('should reject a suffix with a gap', async () => {
        const strategy = buildStrategy(3);
        await saveGenerationStrategy(strategy, strictConfiguration);
        recordRuns(strategy, 2);

        await expect(
          updateGenerationStrategy(strategy, [strategy.generatorRuns[4]], strictConfiguration)
        ).rejects.toMatchObject({
          code: 'CHECKPOINT_MISMATCH',
          context: { persistedRunCount: 3, pendingRunCount: 2, receivedRunCount: 1 },
        });
      });

      it('should reject reordered runs', async () => {
        const strategy = buildStrategy(3);
        await saveGenerationStrategy(strategy, strictConfiguration);
        recordRuns(strategy, 2);
        const [first, second] = pendingGeneratorRuns(strategy);

        await expect(
          updateGenerationStrategy(strategy, [second, first], strictConfiguration)
        ).rejects.toBeInstanceOf(CheckpointMismatchError);
      });
    });
  });

  describe('findGenerationStrategyByExperiment', () => {
    it('should report absence as a result', async () => {
      const lookup = await findGenerationStrategyByExperiment('exp1', configuration);

      expect(lookup).toEqual({
        found: false,
        reason: 'no_strategy_attached',
        experimentName: 'exp1',
      });
    });

    it('should return the attached strategy', async () => {
      await saveGenerationStrategy(buildStrategy(2), configuration);

      const lookup = await findGenerationStrategyByExperiment('exp1', configuration);

      expect(lookup.found).toBe(true);
      if (lookup.found) {
        expect(lookup.strategy.persistedRunCount).toBe(2);
        expect(pendingGeneratorRuns(lookup.strategy)).toEqual([]);
      }
    });
  });

  describe('loadGenerationStrategyByExperiment', () => {
    it('should fail with NoStrategyAttachedError when none is attached', async () => {
      const failure = loadGenerationStrategyByExperiment('exp1', configuration);

      await expect(failure).rejects.toBeInstanceOf(NoStrategyAttachedError);
      await expect(failure).rejects.toMatchObject({ code: 'NO_STRATEGY_ATTACHED' });
    });

    it('should load a strategy that continues from its durable checkpoint', async () => {
      const strategy = buildStrategy(3);
      await saveGenerationStrategy(strategy, configuration);

      const loaded = await loadGenerationStrategyByExperiment('exp1', configuration);
      recordRuns(loaded, 1);
      await updateGenerationStrategy(loaded, pendingGeneratorRuns(loaded), configuration);

      expect(loaded.persistedRunCount).toBe(4);
      expect(backend.storedRunCount('exp1')).toBe(4);
    });
  });
});
