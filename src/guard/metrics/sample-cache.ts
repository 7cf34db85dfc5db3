/**
 * Latest Sample Cache
 *
 * Samplers run on their own cadence and may momentarily return nothing
 * usable. The cache keeps the last good value per field so every tick works
 * on a complete, clamped snapshot.
 */

import { THERMAL_LEVELS, type MetricSnapshot, type RawMetricReading, type ThermalLevel } from '../types/index.js';

export interface MetricSource {
  /** Latest values the samplers hold. Fields may be missing or NaN. */
  read(): Partial<RawMetricReading>;
}

type NumericField = keyof RawMetricReading;

const FIELDS: readonly NumericField[] = [
  'uploadBytesPerSecond',
  'downloadBytesPerSecond',
  'cumulativeUploadBytes',
  'cumulativeDownloadBytes',
  'cpuUsagePercent',
  'batteryLevelPercent',
  'batteryDrainPerHourPercent',
  'thermalLevel',
];

export class LatestSampleCache {
  private values: RawMetricReading = {
    uploadBytesPerSecond: 0,
    downloadBytesPerSecond: 0,
    cumulativeUploadBytes: 0,
    cumulativeDownloadBytes: 0,
    cpuUsagePercent: 0,
    batteryLevelPercent: 0,
    batteryDrainPerHourPercent: 0,
    thermalLevel: 0,
  };
  private staleFields = new Set<NumericField>();
  private readFields = new Set<NumericField>();

  /**
   * Merges a reading, keeping previous values for missing or non-numeric fields
   */
  update(reading: Partial<RawMetricReading>): void {
    const next: RawMetricReading = { ...this.values };
    this.staleFields.clear();

    for (const field of FIELDS) {
      const value = reading[field];
      if (typeof value === 'number' && Number.isFinite(value)) {
        next[field] = value;
        this.readFields.add(field);
      } else {
        this.staleFields.add(field);
      }
    }

    this.values = next;
  }

  /**
   * Fields that fell back to the previous value on the last update
   */
  getStaleFields(): NumericField[] {
    return [...this.staleFields];
  }

  /**
   * Last good value of a field, or undefined while no sampler has ever
   * delivered one
   */
  knownValue(field: NumericField): number | undefined {
    return this.readFields.has(field) ? this.values[field] : undefined;
  }

  snapshot(timestamp: number): MetricSnapshot {
    const v = this.values;
    return {
      timestamp,
      uploadBytesPerSecond: Math.max(0, v.uploadBytesPerSecond),
      downloadBytesPerSecond: Math.max(0, v.downloadBytesPerSecond),
      cumulativeUploadBytes: Math.max(0, v.cumulativeUploadBytes),
      cumulativeDownloadBytes: Math.max(0, v.cumulativeDownloadBytes),
      cpuUsagePercent: clamp(v.cpuUsagePercent, 0, 100),
      batteryLevelPercent: clamp(v.batteryLevelPercent, 0, 100),
      batteryDrainPerHourPercent: v.batteryDrainPerHourPercent,
      thermalLevel: toThermalLevel(v.thermalLevel),
    };
  }
}

export function toThermalLevel(ordinal: number): ThermalLevel {
  const index = clamp(Math.round(ordinal), 0, THERMAL_LEVELS.length - 1);
  return THERMAL_LEVELS[index];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
