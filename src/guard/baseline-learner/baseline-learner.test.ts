/**
 * BaselineLearner Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BaselineLearner, foldBaselineValue, type BaselineSettings } from './baseline-learner.js';

const settings: BaselineSettings = { coldStartSamples: 30, smoothing: 0.1 };

describe('foldBaselineValue', () => {
  it('should compute a running mean during cold start', () => {
    expect(foldBaselineValue(0, 10, 0, settings)).toBe(10);
    expect(foldBaselineValue(10, 20, 1, settings)).toBe(15);
    expect(foldBaselineValue(15, 30, 2, settings)).toBe(20);
  });

  it('should switch to an exponential moving average once warm', () => {
    expect(foldBaselineValue(100, 200, 30, settings)).toBeCloseTo(110, 10);
    expect(foldBaselineValue(100, 0, 45, settings)).toBeCloseTo(90, 10);
  });
});

describe('BaselineLearner', () => {
  let learner: BaselineLearner;

  beforeEach(() => {
    learner = new BaselineLearner(settings);
  });

  it('should start cold with a zero estimate', () => {
    expect(learner.getEstimate()).toEqual({
      uploadBytesPerSecond: 0,
      downloadBytesPerSecond: 0,
      cpuUsagePercent: 0,
      sampleCount: 0,
      warm: false,
    });
  });

  it('should average each metric independently', () => {
    learner.observe(1_000, 4_000, 2);
    learner.observe(3_000, 8_000, 4);

    const estimate = learner.getEstimate();
    expect(estimate.uploadBytesPerSecond).toBe(2_000);
    expect(estimate.downloadBytesPerSecond).toBe(6_000);
    expect(estimate.cpuUsagePercent).toBe(3);
    expect(estimate.sampleCount).toBe(2);
  });

  it('should become warm exactly at the cold-start count', () => {
    for (let i = 0; i < 29; i++) {
      learner.observe(100, 100, 1);
    }
    expect(learner.isWarm()).toBe(false);

    learner.observe(100, 100, 1);
    expect(learner.isWarm()).toBe(true);
    expect(learner.getEstimate().warm).toBe(true);
  });

  it('should limit the pull of a single spike once warm', () => {
    for (let i = 0; i < 30; i++) {
      learner.observe(1_000, 0, 5);
    }

    learner.observe(101_000, 0, 5);

    expect(learner.getEstimate().uploadBytesPerSecond).toBeCloseTo(11_000, 6);
  });
});
