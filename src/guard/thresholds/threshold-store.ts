/**
 * Threshold Store
 *
 * Holds the user's per-metric alert thresholds. The engine only needs the
 * read side (`ThresholdStore`); the in-memory implementation adds editing with
 * bounds checks for hosts that do not bring their own store.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import {
  ALERT_METRICS,
  ALERT_METRIC_SPECS,
  type AlertMetric,
  type AlertThreshold,
  type ThresholdMap,
} from '../types/index.js';

export interface ThresholdStore {
  getThresholds(): readonly AlertThreshold[];
}

export function defaultThreshold(metric: AlertMetric): AlertThreshold {
  return { metric, value: ALERT_METRIC_SPECS[metric].defaultValue, enabled: true };
}

export function createDefaultThresholds(): AlertThreshold[] {
  return ALERT_METRICS.map(defaultThreshold);
}

/**
 * Checks a threshold against its metric's editing bounds
 */
export function validateThreshold(threshold: AlertThreshold): string[] {
  const errors: string[] = [];
  const spec = ALERT_METRIC_SPECS[threshold.metric];

  if (!spec) {
    errors.push(`Unknown threshold metric: ${String(threshold.metric)}`);
    return errors;
  }
  if (!Number.isFinite(threshold.value)) {
    errors.push(`${threshold.metric} value must be a finite number`);
  } else if (threshold.value < spec.min || threshold.value > spec.max) {
    errors.push(`${threshold.metric} value ${threshold.value} is outside ${spec.min}-${spec.max} ${spec.unit}`);
  }
  return errors;
}

/**
 * Turns whatever a store returns into exactly one usable threshold per
 * metric. Never throws: missing metrics fall back to defaults, later
 * duplicates win, non-finite values disable the metric and negative values
 * clamp to zero.
 */
export function resolveThresholds(thresholds: readonly AlertThreshold[]): ThresholdMap {
  const resolved: Record<AlertMetric, AlertThreshold> = {
    uploadRate: defaultThreshold('uploadRate'),
    downloadRate: defaultThreshold('downloadRate'),
    cpuUsage: defaultThreshold('cpuUsage'),
    batteryDrain: defaultThreshold('batteryDrain'),
    totalUpload: defaultThreshold('totalUpload'),
    totalDownload: defaultThreshold('totalDownload'),
  };

  for (const threshold of thresholds) {
    if (!ALERT_METRICS.includes(threshold.metric)) {
      continue;
    }
    const finite = Number.isFinite(threshold.value);
    resolved[threshold.metric] = {
      metric: threshold.metric,
      value: finite ? Math.max(0, threshold.value) : 0,
      enabled: finite && threshold.enabled === true,
    };
  }

  return resolved;
}

export class InMemoryThresholdStore extends EventEmitter implements ThresholdStore {
  private readonly logger = createSubsystemLogger('guard/thresholds');
  private thresholds: AlertThreshold[];

  constructor(initial: readonly AlertThreshold[] = createDefaultThresholds()) {
    super();
    this.thresholds = [...resolveAll(initial)];
  }

  getThresholds(): readonly AlertThreshold[] {
    return this.thresholds.map((t) => ({ ...t }));
  }

  threshold(metric: AlertMetric): AlertThreshold {
    const found = this.thresholds.find((t) => t.metric === metric);
    return found ? { ...found } : defaultThreshold(metric);
  }

  /**
   * Replaces one metric's threshold. Throws when the value is out of bounds.
   */
  update(threshold: AlertThreshold): void {
    const errors = validateThreshold(threshold);
    if (errors.length > 0) {
      this.logger.warn('Rejected threshold update', { metric: threshold.metric, value: threshold.value, errors });
      throw new Error(`Invalid threshold: ${errors.join('; ')}`);
    }

    this.thresholds = this.thresholds.map((t) => (t.metric === threshold.metric ? { ...threshold } : t));
    this.logger.info('Threshold updated', { ...threshold });
    this.emit('thresholdsChanged', this.getThresholds());
  }

  setEnabled(metric: AlertMetric, enabled: boolean): void {
    this.update({ ...this.threshold(metric), enabled });
  }

  reset(): void {
    this.thresholds = createDefaultThresholds();
    this.logger.info('Thresholds reset to defaults');
    this.emit('thresholdsChanged', this.getThresholds());
  }
}

function resolveAll(thresholds: readonly AlertThreshold[]): AlertThreshold[] {
  const map = resolveThresholds(thresholds);
  return ALERT_METRICS.map((metric) => ({ ...map[metric] }));
}
