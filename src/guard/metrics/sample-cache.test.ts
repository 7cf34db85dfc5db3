/**
 * LatestSampleCache Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { LatestSampleCache, toThermalLevel } from './sample-cache.js';
import { propertyTestConfig, rawReadingArbitrary } from '../test-setup.js';

describe('LatestSampleCache', () => {
  let cache: LatestSampleCache;

  beforeEach(() => {
    cache = new LatestSampleCache();
  });

  it('should start from zeroed metrics', () => {
    expect(cache.snapshot(5)).toEqual({
      timestamp: 5,
      uploadBytesPerSecond: 0,
      downloadBytesPerSecond: 0,
      cumulativeUploadBytes: 0,
      cumulativeDownloadBytes: 0,
      cpuUsagePercent: 0,
      batteryLevelPercent: 0,
      batteryDrainPerHourPercent: 0,
      thermalLevel: 'nominal',
    });
  });

  it('should keep the previous value for missing or non-numeric fields', () => {
    cache.update({ cpuUsagePercent: 12, uploadBytesPerSecond: 3_000 });
    cache.update({ cpuUsagePercent: Number.NaN, downloadBytesPerSecond: 4_000 });

    const snapshot = cache.snapshot(0);
    expect(snapshot.cpuUsagePercent).toBe(12);
    expect(snapshot.uploadBytesPerSecond).toBe(3_000);
    expect(snapshot.downloadBytesPerSecond).toBe(4_000);
    expect(cache.getStaleFields()).toContain('cpuUsagePercent');
    expect(cache.getStaleFields()).not.toContain('downloadBytesPerSecond');
  });

  it('should report fields no sampler has delivered as unknown', () => {
    expect(cache.knownValue('cumulativeUploadBytes')).toBeUndefined();

    cache.update({ cpuUsagePercent: 10 });
    expect(cache.knownValue('cumulativeUploadBytes')).toBeUndefined();

    cache.update({ cumulativeUploadBytes: 7_000 });
    cache.update({ cumulativeUploadBytes: Number.NaN });
    expect(cache.knownValue('cumulativeUploadBytes')).toBe(7_000);
  });

  it('should clamp values into their valid ranges', () => {
    cache.update({
      uploadBytesPerSecond: -10,
      cpuUsagePercent: 150,
      batteryLevelPercent: -3,
      batteryDrainPerHourPercent: -2,
      thermalLevel: 7,
    });

    const snapshot = cache.snapshot(0);
    expect(snapshot.uploadBytesPerSecond).toBe(0);
    expect(snapshot.cpuUsagePercent).toBe(100);
    expect(snapshot.batteryLevelPercent).toBe(0);
    expect(snapshot.batteryDrainPerHourPercent).toBe(-2);
    expect(snapshot.thermalLevel).toBe('critical');
  });

  it('should always produce finite, in-range snapshots', () => {
    fc.assert(
      fc.property(fc.array(rawReadingArbitrary, { maxLength: 5 }), (readings) => {
        const local = new LatestSampleCache();
        readings.forEach((reading) => local.update(reading));

        const snapshot = local.snapshot(0);
        expect(Number.isFinite(snapshot.uploadBytesPerSecond)).toBe(true);
        expect(snapshot.uploadBytesPerSecond).toBeGreaterThanOrEqual(0);
        expect(snapshot.cpuUsagePercent).toBeGreaterThanOrEqual(0);
        expect(snapshot.cpuUsagePercent).toBeLessThanOrEqual(100);
        expect(Number.isFinite(snapshot.batteryDrainPerHourPercent)).toBe(true);
      }),
      propertyTestConfig,
    );
  });
});

describe('toThermalLevel', () => {
  it('should map ordinals to levels', () => {
    expect(toThermalLevel(0)).toBe('nominal');
    expect(toThermalLevel(1.4)).toBe('fair');
    expect(toThermalLevel(2)).toBe('serious');
    expect(toThermalLevel(3)).toBe('critical');
  });

  it('should clamp out-of-range ordinals', () => {
    expect(toThermalLevel(-1)).toBe('nominal');
    expect(toThermalLevel(12)).toBe('critical');
  });
});
