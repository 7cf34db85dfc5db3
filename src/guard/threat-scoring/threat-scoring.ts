/**
 * Threat Scoring Engine
 *
 * Pure, total scoring of one tick. Nothing is scored while the device is in
 * use; during idle, independent weighted factors are summed and capped at
 * 100. Inputs are clamped at the boundary so any numeric input produces a
 * score without NaN or Infinity leaking through.
 */

import type {
  BaselineEstimate,
  FactorName,
  MetricSnapshot,
  RollingTotals,
  ThreatAssessment,
  ThreatFactor,
  ThresholdMap,
} from '../types/index.js';

export const BYTES_PER_MB = 1_000_000;

export const MAX_THREAT_SCORE = 100;

/** Points each factor contributes when it fires */
export const FACTOR_SCORES = {
  totalUpload: 50,
  totalUploadApproaching: 20,
  totalDownload: 30,
  sustainedUpload: 25,
  sustainedDownload: 10,
  idleCpu: 25,
  batteryDrain: 20,
  thermal: 20,
  surveillancePattern: 20,
} as const satisfies Record<FactorName, number>;

/** Share of the total-upload limit at which the early warning fires */
export const APPROACHING_LIMIT_RATIO = 0.8;

/**
 * Fixed co-occurrence heuristic for screen mirroring or surveillance:
 * moderate upload, CPU and drain together while idle. Not scaled by user
 * thresholds.
 *
 * TODO: scale with the user thresholds and learned baseline like the other
 * factors do.
 */
export const SURVEILLANCE_PATTERN = {
  minHourlyUploadMB: 30,
  minCpuPercent: 20,
  minBatteryDrainPerHour: 3,
} as const;

export interface ScoringContext {
  snapshot: MetricSnapshot;
  isIdle: boolean;
  baseline: BaselineEstimate;
  thresholds: ThresholdMap;
  rollingTotals: RollingTotals;
  /** Multiple of the learned baseline a rate must exceed to count as sustained */
  baselineMultiplier: number;
}

export function toMegabytes(bytes: number): number {
  return bytes / BYTES_PER_MB;
}

/** Converts an instantaneous bytes/s rate to its hourly equivalent in MB */
export function toMegabytesPerHour(bytesPerSecond: number): number {
  return (bytesPerSecond / BYTES_PER_MB) * 3600;
}

/**
 * Scores one tick. Returns score 0 and no factors while not idle.
 */
export function scoreThreat(context: ScoringContext): ThreatAssessment {
  const upload = nonNegative(context.snapshot.uploadBytesPerSecond);
  const download = nonNegative(context.snapshot.downloadBytesPerSecond);
  const cpu = Math.min(100, nonNegative(context.snapshot.cpuUsagePercent));
  const drain = finiteOr(context.snapshot.batteryDrainPerHourPercent, 0);
  const totalUploadMB = toMegabytes(nonNegative(context.rollingTotals.uploadBytes));
  const totalDownloadMB = toMegabytes(nonNegative(context.rollingTotals.downloadBytes));
  const uploadRateMBPerHour = toMegabytesPerHour(upload);
  const downloadRateMBPerHour = toMegabytesPerHour(download);

  const assessment: ThreatAssessment = {
    score: 0,
    factors: [],
    totalUploadMB,
    totalDownloadMB,
    uploadRateMBPerHour,
    downloadRateMBPerHour,
  };

  if (!context.isIdle) {
    return assessment;
  }

  const { thresholds, baseline } = context;
  const multiplier = Math.max(1, finiteOr(context.baselineMultiplier, 1));
  const factors: ThreatFactor[] = [];
  const add = (name: FactorName, reason: string): void => {
    factors.push({ name, score: FACTOR_SCORES[name], reason });
  };

  // 1. Hourly upload total
  const totalUpload = thresholds.totalUpload;
  if (totalUpload.enabled) {
    if (totalUploadMB > totalUpload.value) {
      add('totalUpload', `Upload exceeded ${fmt(totalUpload.value)} MB limit (${fmt(totalUploadMB)} MB in the last hour)`);
    } else if (totalUploadMB > totalUpload.value * APPROACHING_LIMIT_RATIO) {
      add('totalUploadApproaching', `Upload approaching limit (${fmt(totalUploadMB)}/${fmt(totalUpload.value)} MB)`);
    }
  }

  // 2. Hourly download total
  const totalDownload = thresholds.totalDownload;
  if (totalDownload.enabled && totalDownloadMB > totalDownload.value) {
    add('totalDownload', `Download exceeded ${fmt(totalDownload.value)} MB limit (${fmt(totalDownloadMB)} MB in the last hour)`);
  }

  // 3. Sustained rates: absolute limit AND well above the learned baseline
  const sustainedUpload = thresholds.uploadRate;
  if (
    sustainedUpload.enabled &&
    uploadRateMBPerHour > sustainedUpload.value &&
    exceedsBaseline(upload, baseline.uploadBytesPerSecond, multiplier, baseline.warm)
  ) {
    add(
      'sustainedUpload',
      `Sustained upload ${fmt(uploadRateMBPerHour)} MB/h (limit ${fmt(sustainedUpload.value)} MB/h, ${describeBaseline(upload, baseline.uploadBytesPerSecond)})`,
    );
  }

  const sustainedDownload = thresholds.downloadRate;
  if (
    sustainedDownload.enabled &&
    downloadRateMBPerHour > sustainedDownload.value &&
    exceedsBaseline(download, baseline.downloadBytesPerSecond, multiplier, baseline.warm)
  ) {
    add(
      'sustainedDownload',
      `Sustained download ${fmt(downloadRateMBPerHour)} MB/h (limit ${fmt(sustainedDownload.value)} MB/h, ${describeBaseline(download, baseline.downloadBytesPerSecond)})`,
    );
  }

  // 4. CPU while idle
  const cpuLimit = thresholds.cpuUsage;
  if (cpuLimit.enabled && cpu > cpuLimit.value) {
    add('idleCpu', `High CPU while idle (${fmt(cpu)}%, limit ${fmt(cpuLimit.value)}%)`);
  }

  // 5. Battery drain
  const drainLimit = thresholds.batteryDrain;
  if (drainLimit.enabled && drain > drainLimit.value) {
    add('batteryDrain', `Fast battery drain (${fmt(drain)}%/h, limit ${fmt(drainLimit.value)}%/h)`);
  }

  // 6. Thermal
  const thermal = context.snapshot.thermalLevel;
  if (thermal === 'serious' || thermal === 'critical') {
    add('thermal', `${thermal === 'critical' ? 'Critical' : 'Serious'} thermal state`);
  }

  // 7. Co-occurrence pattern
  if (
    totalUploadMB > SURVEILLANCE_PATTERN.minHourlyUploadMB &&
    cpu > SURVEILLANCE_PATTERN.minCpuPercent &&
    drain > SURVEILLANCE_PATTERN.minBatteryDrainPerHour
  ) {
    add(
      'surveillancePattern',
      `Possible screen mirroring: ${fmt(totalUploadMB)} MB uploaded, ${fmt(cpu)}% CPU, ${fmt(drain)}%/h drain while idle`,
    );
  }

  const sum = factors.reduce((total, factor) => total + factor.score, 0);
  assessment.score = Math.min(MAX_THREAT_SCORE, sum);
  assessment.factors = factors;
  return assessment;
}

/**
 * Highest-scoring factor, earliest in evaluation order on ties
 */
export function dominantFactor(factors: readonly ThreatFactor[]): ThreatFactor | undefined {
  let best: ThreatFactor | undefined;
  for (const factor of factors) {
    if (!best || factor.score > best.score) {
      best = factor;
    }
  }
  return best;
}

function exceedsBaseline(rate: number, baselineRate: number, multiplier: number, warm: boolean): boolean {
  if (!warm) {
    return false;
  }
  return rate > multiplier * nonNegative(baselineRate);
}

function describeBaseline(rate: number, baselineRate: number): string {
  if (!(baselineRate > 0)) {
    return 'idle baseline is silent';
  }
  return `${fmt(rate / baselineRate)}x idle baseline`;
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

function fmt(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}
