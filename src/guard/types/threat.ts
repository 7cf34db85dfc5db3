/**
 * Threat Types
 */

export type ThreatLevel = 'normal' | 'warning' | 'alert' | 'critical';

export const THREAT_LEVELS: readonly ThreatLevel[] = ['normal', 'warning', 'alert', 'critical'];

export type FactorName =
  | 'totalUpload'
  | 'totalUploadApproaching'
  | 'totalDownload'
  | 'sustainedUpload'
  | 'sustainedDownload'
  | 'idleCpu'
  | 'batteryDrain'
  | 'thermal'
  | 'surveillancePattern';

export interface ThreatFactor {
  name: FactorName;
  score: number;
  reason: string;
}

export interface ThreatAssessment {
  /** Integer in [0, 100] */
  score: number;
  factors: ThreatFactor[];
  /** Hourly totals in MB that the assessment saw */
  totalUploadMB: number;
  totalDownloadMB: number;
  /** Instantaneous rates converted to MB/h */
  uploadRateMBPerHour: number;
  downloadRateMBPerHour: number;
}

export interface BaselineEstimate {
  uploadBytesPerSecond: number;
  downloadBytesPerSecond: number;
  cpuUsagePercent: number;
  sampleCount: number;
  /** True once the cold-start mean has handed over to the moving average */
  warm: boolean;
}
