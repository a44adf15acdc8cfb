/**
 * OutcomeFeedbackAdapter Unit Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';

import type { FeatureVector } from '@pipeline/types';
import { RecordingLearningSink, RecordingLogger, applicationRecord } from '@pipeline/test-utils';
import { OutcomeFeedbackAdapter } from '../../../src/feedback/outcome-feedback';
import { SignalLog } from '../../../src/feedback/signal-log';
import { WeightsRegistry } from '../../../src/scoring/weights-registry';

const FEATURES: FeatureVector = {
  semanticSimilarity: 0.5,
  skillMatch: 1,
  experienceMatch: 0.8,
  deadlineUrgency: 0.3,
  historicalSuccessRate: 0.5,
  prestige: 0.5,
  compensationFit: 0.5,
};

describe('OutcomeFeedbackAdapter', () => {
  let logger: RecordingLogger;
  let sink: RecordingLearningSink;
  let registry: WeightsRegistry;
  let adapter: OutcomeFeedbackAdapter;

  beforeEach(() => {
    logger = new RecordingLogger();
    sink = new RecordingLearningSink();
    registry = new WeightsRegistry(logger);
    adapter = new OutcomeFeedbackAdapter(
      { learningRate: 0.1 },
      { sink, weights: registry, logger, sleep: async () => undefined }
    );
  });

  it('should publish a delta for every feature', async () => {
    const record = applicationRecord().scored(0.6, 2, 1, FEATURES).build();

    const signal = await adapter.recordOutcome(record, 'Accepted', 5_000);

    expect(signal).toEqual({
      applicationId: record.id,
      weightsVersion: 1,
      outcome: 'Accepted',
      predictedScore: 0.6,
      error: 0.4,
      featureDeltas: {
        semanticSimilarity: 0.02,
        skillMatch: 0.04,
        experienceMatch: 0.032,
        deadlineUrgency: 0.012,
        historicalSuccessRate: 0.02,
        prestige: 0.02,
        compensationFit: 0.02,
      },
      observedAt: 5_000,
    });
    expect(sink.signals).toEqual([signal]);
  });

  it.each<readonly ['Rejected' | 'NoResponse', number]>([
    ['Rejected', -0.6],
    ['NoResponse', -0.4],
  ] as const)('should use the %s target', async (outcome, error) => {
    const record = applicationRecord().scored(0.6, 2, 1, FEATURES).build();

    const signal = await adapter.recordOutcome(record, outcome, 0);

    expect(signal?.error).toBe(error);
  });

  it('should attribute to the scoring version, not the current one', async () => {
    registry.install({ weights: { skillMatch: 1 } }, 'learning');
    const record = applicationRecord().scored(0.6, 2, 1, FEATURES).build();

    const signal = await adapter.recordOutcome(record, 'Accepted', 0);

    expect(signal?.weightsVersion).toBe(1);
    expect(Object.keys(signal?.featureDeltas ?? {})).toHaveLength(7);
    expect(registry.current().version).toBe(2);
  });

  it('should include features the scoring weights leave out', async () => {
    registry.install({ weights: { skillMatch: 1 } }, 'operator');
    const record = applicationRecord().scored(0.6, 2, 2, FEATURES).build();

    const signal = await adapter.recordOutcome(record, 'Rejected', 0);

    expect(signal?.weightsVersion).toBe(2);
    expect(signal?.featureDeltas.historicalSuccessRate).toBe(-0.03);
    expect(signal?.featureDeltas.prestige).toBe(-0.03);
  });

  it('should fall back to the current version when the scoring version is unknown', async () => {
    const record = applicationRecord().scored(0.6, 2, 9, FEATURES).build();

    const signal = await adapter.recordOutcome(record, 'Accepted', 0);

    expect(signal?.weightsVersion).toBe(1);
    expect(logger.hasLogMatching('warn', 'Weights version not found')).toBe(true);
  });

  it('should emit one signal per application', async () => {
    const record = applicationRecord().scored(0.6, 2, 1, FEATURES).build();

    await adapter.recordOutcome(record, 'Accepted', 0);
    const duplicate = await adapter.recordOutcome(record, 'Rejected', 1);

    expect(duplicate).toBeNull();
    expect(sink.signals).toHaveLength(1);
  });

  it('should skip an unscored application', async () => {
    const signal = await adapter.recordOutcome(applicationRecord().build(), 'Accepted', 0);

    expect(signal).toBeNull();
    expect(sink.signals).toEqual([]);
  });

  it('should retry publishing and succeed', async () => {
    sink.failNext(1);
    const record = applicationRecord().scored(0.6, 2, 1, FEATURES).build();

    await adapter.recordOutcome(record, 'Accepted', 0);

    expect(sink.signals).toHaveLength(1);
  });

  it('should log and drop the signal when publishing keeps failing', async () => {
    sink.failNext(3);
    const record = applicationRecord().scored(0.6, 2, 1, FEATURES).build();

    const signal = await adapter.recordOutcome(record, 'Accepted', 0);

    expect(signal).not.toBeNull();
    expect(sink.signals).toEqual([]);
    expect(logger.hasLogMatching('error', 'Weight adjustment signal dropped')).toBe(true);
  });
});

describe('SignalLog', () => {
  it('should keep only the most recent signals', async () => {
    const log = new SignalLog(new RecordingLogger(), 2);
    for (const applicationId of ['app_1', 'app_2', 'app_3']) {
      await log.publish({
        applicationId,
        weightsVersion: 1,
        outcome: 'Rejected',
        predictedScore: 0.5,
        error: -0.5,
        featureDeltas: {},
        observedAt: 0,
      });
    }

    expect(log.recent().map(s => s.applicationId)).toEqual(['app_2', 'app_3']);
  });
});
