/**
 * Tests for domain/experiments/experiment.ts
 */

import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import {
  addTrial,
  attachData,
  createExperiment,
  getTrial,
  getTrialData,
  isFullExperiment,
  nextTrialIndex,
  trialArms,
  type SimpleExperiment,
} from '../../src/domain/index.js';
import { ValidationError } from '../../src/errors.js';

const CREATED_AT = DateTime.fromISO('2026-01-15T10:00:00.000Z', { zone: 'utc' });

describe('Experiment helpers', () => {
  it('should create an empty experiment', () => {
    const experiment = createExperiment({ name: 'exp1', createdAt: CREATED_AT });

    expect(experiment).toMatchObject({ kind: 'experiment', name: 'exp1', trials: [], data: [], properties: {} });
    expect(experiment.createdAt).toBe(CREATED_AT);
  });

  it('should reject a blank name', () => {
    expect(() => createExperiment({ name: '   ' })).toThrow(ValidationError);
  });

  it('should tell the full variant from the simple one', () => {
    const experiment = createExperiment({ name: 'exp1' });
    const simple: SimpleExperiment = { ...experiment, kind: 'simple_experiment', evaluationFunctionName: 'branin' };

    expect(isFullExperiment(experiment)).toBe(true);
    expect(isFullExperiment(simple)).toBe(false);
  });

  it('should add single-arm and batch trials with increasing indices', () => {
    const experiment = createExperiment({ name: 'exp1' });

    const single = addTrial(experiment, [{ name: '0_0', parameters: { x: 1 } }]);
    const batch = addTrial(experiment, [
      { name: '1_0', parameters: { x: 2 } },
      { name: '1_1', parameters: { x: 3 } },
    ]);

    expect(single).toMatchObject({ kind: 'trial', index: 0, status: 'candidate' });
    expect(batch).toMatchObject({ kind: 'batch_trial', index: 1 });
    expect(trialArms(batch).map((arm) => arm.name)).toEqual(['1_0', '1_1']);
    expect(nextTrialIndex(experiment)).toBe(2);
  });

  it('should never reuse an index below the highest one', () => {
    const experiment = createExperiment({ name: 'exp1' });
    experiment.trials.push({ kind: 'trial', index: 7, status: 'completed', createdAt: CREATED_AT });

    expect(addTrial(experiment, []).index).toBe(8);
  });

  it('should number a long run of trials sequentially', () => {
    const experiment = createExperiment({ name: 'exp1' });
    for (let i = 0; i < 20_000; i++) {
      addTrial(experiment, [], { createdAt: CREATED_AT });
    }

    expect(experiment.trials.at(-1)?.index).toBe(19_999);
    expect(experiment.trials[12_345]?.index).toBe(12_345);
    expect(nextTrialIndex(experiment)).toBe(20_000);
  });

  it('should give an arm-less single trial no arms', () => {
    const experiment = createExperiment({ name: 'exp1' });

    expect(trialArms(addTrial(experiment, []))).toEqual([]);
  });

  it('should attach data to owned trials only', () => {
    const experiment = createExperiment({ name: 'exp1' });
    addTrial(experiment, [{ name: '0_0', parameters: {} }]);
    addTrial(experiment, [{ name: '1_0', parameters: {} }]);

    attachData(experiment, [
      { trialIndex: 1, armName: '1_0', metricName: 'loss', mean: 0.4, sem: null },
      { trialIndex: 0, armName: '0_0', metricName: 'loss', mean: 0.9, sem: 0.05 },
    ]);

    expect(getTrialData(experiment, 1).map((record) => record.mean)).toEqual([0.4]);
    expect(getTrial(experiment, 0)?.kind).toBe('trial');
    expect(getTrial(experiment, 5)).toBeUndefined();
    expect(() =>
      attachData(experiment, [{ trialIndex: 5, armName: '5_0', metricName: 'loss', mean: 1, sem: null }])
    ).toThrow('Cannot attach data for trial 5: no such trial on experiment exp1');
  });
});
