/**
 * AlertThreshold Types
 *
 * User-adjustable per-metric limits. The engine reads them on every tick and
 * never writes them.
 */

export type AlertMetric =
  | 'uploadRate'
  | 'downloadRate'
  | 'cpuUsage'
  | 'batteryDrain'
  | 'totalUpload'
  | 'totalDownload';

export const ALERT_METRICS: readonly AlertMetric[] = [
  'uploadRate',
  'downloadRate',
  'cpuUsage',
  'batteryDrain',
  'totalUpload',
  'totalDownload',
];

export interface AlertThreshold {
  metric: AlertMetric;
  value: number;
  enabled: boolean;
}

/** Editing metadata for a metric's threshold */
export interface AlertMetricSpec {
  title: string;
  description: string;
  unit: 'MB/h' | '%' | '%/h' | 'MB';
  defaultValue: number;
  min: number;
  max: number;
  step: number;
}

export const ALERT_METRIC_SPECS: Readonly<Record<AlertMetric, AlertMetricSpec>> = {
  uploadRate: {
    title: 'Sustained Upload Rate',
    description: 'Alert when upload rate sustains above this',
    unit: 'MB/h',
    defaultValue: 200,
    min: 50,
    max: 2000,
    step: 50,
  },
  downloadRate: {
    title: 'Sustained Download Rate',
    description: 'Alert when download rate sustains above this',
    unit: 'MB/h',
    defaultValue: 500,
    min: 50,
    max: 2000,
    step: 50,
  },
  cpuUsage: {
    title: 'CPU While Idle',
    description: 'Alert when CPU stays high while the device is idle',
    unit: '%',
    defaultValue: 50,
    min: 20,
    max: 90,
    step: 5,
  },
  batteryDrain: {
    title: 'Battery Drain While Idle',
    description: 'Alert when battery drains fast while idle',
    unit: '%/h',
    defaultValue: 10,
    min: 5,
    max: 30,
    step: 1,
  },
  totalUpload: {
    title: 'Total Upload (1 hour)',
    description: 'Alert when total data uploaded exceeds this in 1 hour',
    unit: 'MB',
    defaultValue: 100,
    min: 50,
    max: 1000,
    step: 50,
  },
  totalDownload: {
    title: 'Total Download (1 hour)',
    description: 'Alert when total data downloaded exceeds this in 1 hour',
    unit: 'MB',
    defaultValue: 300,
    min: 100,
    max: 2000,
    step: 50,
  },
};

/** Thresholds resolved to exactly one entry per metric */
export type ThresholdMap = Readonly<Record<AlertMetric, AlertThreshold>>;
