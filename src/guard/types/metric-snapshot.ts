/**
 * Metric Snapshot Types
 *
 * Shapes of the device metrics the engine consumes. Collection itself is done
 * by external samplers; the engine only ever sees already-sampled values.
 */

/** Device thermal state, in ascending order of severity */
export type ThermalLevel = 'nominal' | 'fair' | 'serious' | 'critical';

export const THERMAL_LEVELS: readonly ThermalLevel[] = ['nominal', 'fair', 'serious', 'critical'];

/**
 * One reading as handed over by a metric source. Any field may be missing or
 * non-numeric while a sampler is unavailable.
 */
export interface RawMetricReading {
  uploadBytesPerSecond: number;
  downloadBytesPerSecond: number;
  /** Monotonic interface counter, bytes sent since boot */
  cumulativeUploadBytes: number;
  /** Monotonic interface counter, bytes received since boot */
  cumulativeDownloadBytes: number;
  cpuUsagePercent: number;
  batteryLevelPercent: number;
  /** Percent per hour; negative while charging */
  batteryDrainPerHourPercent: number;
  /** Ordinal 0-3, see THERMAL_LEVELS */
  thermalLevel: number;
}

export interface MetricSnapshot {
  readonly timestamp: number;
  readonly uploadBytesPerSecond: number;
  readonly downloadBytesPerSecond: number;
  readonly cumulativeUploadBytes: number;
  readonly cumulativeDownloadBytes: number;
  readonly cpuUsagePercent: number;
  readonly batteryLevelPercent: number;
  readonly batteryDrainPerHourPercent: number;
  readonly thermalLevel: ThermalLevel;
}

/** Bytes transferred inside the trailing rolling window */
export interface RollingTotals {
  uploadBytes: number;
  downloadBytes: number;
}
