import type { ThreatLevel } from './threat.js';

export type ActivityType =
  | 'monitoringStarted'
  | 'monitoringStopped'
  | 'normal'
  | 'warning'
  | 'alert'
  | 'critical'
  | 'incident';

export interface ActivityEntry {
  id: string;
  timestamp: number;
  type: ActivityType;
  title: string;
  description: string;
  level: ThreatLevel;
}
