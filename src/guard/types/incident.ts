/**
 * Incident Types
 *
 * An incident is one detected anomaly episode. Lifecycle:
 * open -> (acknowledged) -> resolved. Resolved incidents are never reopened.
 */

import type { ThermalLevel } from './metric-snapshot.js';

export type IncidentType =
  | 'screenSurveillance'
  | 'dataExfiltration'
  | 'cpuAnomaly'
  | 'batteryAnomaly'
  | 'thermalAnomaly'
  | 'multiFactorAlert';

export type IncidentSeverity = 'low' | 'medium' | 'high' | 'critical';

export const INCIDENT_SEVERITY_RANK: Readonly<Record<IncidentSeverity, number>> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export const INCIDENT_TYPES: Readonly<Record<IncidentType, { title: string; severity: IncidentSeverity }>> = {
  screenSurveillance: { title: 'Possible Screen Surveillance', severity: 'critical' },
  dataExfiltration: { title: 'Suspicious Data Upload', severity: 'high' },
  cpuAnomaly: { title: 'Abnormal CPU Activity', severity: 'medium' },
  batteryAnomaly: { title: 'Unusual Battery Drain', severity: 'medium' },
  thermalAnomaly: { title: 'Thermal Anomaly', severity: 'medium' },
  multiFactorAlert: { title: 'Multi-Factor Security Alert', severity: 'critical' },
};

export interface IncidentMetrics {
  uploadBytesPerSecond: number;
  downloadBytesPerSecond: number;
  cpuUsagePercent: number;
  batteryDrainPerHourPercent: number;
  thermalLevel: ThermalLevel;
  threatScore: number;
  hourlyUploadBytes: number;
  hourlyDownloadBytes: number;
}

export interface Incident {
  id: string;
  type: IncidentType;
  severity: IncidentSeverity;
  title: string;
  openedAt: number;
  closedAt?: number;
  metrics: IncidentMetrics;
  summary: string;
  details: string[];
  acknowledged: boolean;
  resolved: boolean;
}
