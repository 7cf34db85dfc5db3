/**
 * Property-Based Testing Setup for the guard engine
 *
 * Shared fast-check generators and helpers for guard component tests.
 */

import * as fc from 'fast-check';
import { resolveThresholds } from './thresholds/index.js';
import {
  ALERT_METRICS,
  ALERT_METRIC_SPECS,
  THERMAL_LEVELS,
  type AlertThreshold,
  type BaselineEstimate,
  type MetricSnapshot,
  type RawMetricReading,
  type RollingTotals,
  type ThresholdMap,
} from './types/index.js';

const rate = (max: number) => fc.double({ min: 0, max, noNaN: true });

export const metricSnapshotArbitrary: fc.Arbitrary<MetricSnapshot> = fc.record({
  timestamp: fc.integer({ min: 0, max: 4_000_000_000_000 }),
  uploadBytesPerSecond: rate(50_000_000),
  downloadBytesPerSecond: rate(50_000_000),
  cumulativeUploadBytes: fc.integer({ min: 0, max: Number.MAX_SAFE_INTEGER }),
  cumulativeDownloadBytes: fc.integer({ min: 0, max: Number.MAX_SAFE_INTEGER }),
  cpuUsagePercent: fc.double({ min: 0, max: 100, noNaN: true }),
  batteryLevelPercent: fc.double({ min: 0, max: 100, noNaN: true }),
  batteryDrainPerHourPercent: fc.double({ min: -50, max: 100, noNaN: true }),
  thermalLevel: fc.constantFrom(...THERMAL_LEVELS),
});

/**
 * Snapshots with arbitrary, including hostile, numbers
 */
export const hostileSnapshotArbitrary: fc.Arbitrary<MetricSnapshot> = fc.record({
  timestamp: fc.integer(),
  uploadBytesPerSecond: fc.double(),
  downloadBytesPerSecond: fc.double(),
  cumulativeUploadBytes: fc.double(),
  cumulativeDownloadBytes: fc.double(),
  cpuUsagePercent: fc.double(),
  batteryLevelPercent: fc.double(),
  batteryDrainPerHourPercent: fc.double(),
  thermalLevel: fc.constantFrom(...THERMAL_LEVELS),
});

export const rawReadingArbitrary: fc.Arbitrary<Partial<RawMetricReading>> = fc.record(
  {
    uploadBytesPerSecond: fc.double(),
    downloadBytesPerSecond: fc.double(),
    cumulativeUploadBytes: fc.double(),
    cumulativeDownloadBytes: fc.double(),
    cpuUsagePercent: fc.double(),
    batteryLevelPercent: fc.double(),
    batteryDrainPerHourPercent: fc.double(),
    thermalLevel: fc.integer({ min: -5, max: 10 }),
  },
  { requiredKeys: [] },
);

export const alertThresholdArbitrary: fc.Arbitrary<AlertThreshold> = fc
  .constantFrom(...ALERT_METRICS)
  .chain((metric) =>
    fc.record({
      metric: fc.constant(metric),
      value: fc.double({ min: ALERT_METRIC_SPECS[metric].min, max: ALERT_METRIC_SPECS[metric].max, noNaN: true }),
      enabled: fc.boolean(),
    }),
  );

export const thresholdMapArbitrary: fc.Arbitrary<ThresholdMap> = fc
  .array(alertThresholdArbitrary, { maxLength: 12 })
  .map((list) => resolveThresholds(list));

export const baselineArbitrary: fc.Arbitrary<BaselineEstimate> = fc.record({
  uploadBytesPerSecond: rate(100_000),
  downloadBytesPerSecond: rate(100_000),
  cpuUsagePercent: fc.double({ min: 0, max: 15, noNaN: true }),
  sampleCount: fc.integer({ min: 0, max: 10_000 }),
  warm: fc.boolean(),
});

export const rollingTotalsArbitrary: fc.Arbitrary<RollingTotals> = fc.record({
  uploadBytes: rate(5_000_000_000),
  downloadBytes: rate(5_000_000_000),
});

export function createSnapshot(overrides: Partial<MetricSnapshot> = {}): MetricSnapshot {
  return {
    timestamp: 0,
    uploadBytesPerSecond: 0,
    downloadBytesPerSecond: 0,
    cumulativeUploadBytes: 0,
    cumulativeDownloadBytes: 0,
    cpuUsagePercent: 0,
    batteryLevelPercent: 80,
    batteryDrainPerHourPercent: 0,
    thermalLevel: 'nominal',
    ...overrides,
  };
}

export function createBaseline(overrides: Partial<BaselineEstimate> = {}): BaselineEstimate {
  return {
    uploadBytesPerSecond: 0,
    downloadBytesPerSecond: 0,
    cpuUsagePercent: 0,
    sampleCount: 0,
    warm: false,
    ...overrides,
  };
}

/** Bytes for a number of megabytes in the engine's 1 MB = 10^6 B convention */
export function mb(megabytes: number): number {
  return megabytes * 1_000_000;
}

/**
 * Test configuration for property-based tests
 */
export const propertyTestConfig = {
  numRuns: 100,
  verbose: false,
};
