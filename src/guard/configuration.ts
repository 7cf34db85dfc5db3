/**
 * Guard Configuration
 *
 * Defaults, merging and validation for the engine's tunables.
 */

import type { GuardConfiguration } from './types/index.js';

export type GuardConfigurationOverrides = {
  [K in keyof GuardConfiguration]?: GuardConfiguration[K] extends object
    ? Partial<GuardConfiguration[K]>
    : GuardConfiguration[K];
};

/**
 * Creates the reference configuration, with any overrides merged per section
 */
export function createDefaultGuardConfiguration(overrides: GuardConfigurationOverrides = {}): GuardConfiguration {
  return {
    tickIntervalMs: overrides.tickIntervalMs ?? 3000,
    idle: {
      thresholdMs: 60_000,
      cpuPercent: 15,
      networkBytesPerSecond: 50_000, // 50 KB/s
      ...overrides.idle,
    },
    baseline: {
      coldStartSamples: 30,
      smoothing: 0.1,
      multiplier: 5,
      ...overrides.baseline,
    },
    levels: {
      changeCooldownMs: 60_000,
      ...overrides.levels,
    },
    alerts: {
      incidentDedupMs: 60_000,
      notificationCooldownMs: 5 * 60_000,
      ...overrides.alerts,
    },
    activity: {
      maxEntries: 50,
      ...overrides.activity,
    },
    rollingWindowMs: overrides.rollingWindowMs ?? 60 * 60_000,
  };
}

/**
 * Validates a configuration, returning every problem found
 */
export function validateGuardConfiguration(config: GuardConfiguration): string[] {
  const errors: string[] = [];

  const positive: Array<[string, number]> = [
    ['tickIntervalMs', config.tickIntervalMs],
    ['rollingWindowMs', config.rollingWindowMs],
    ['baseline.coldStartSamples', config.baseline.coldStartSamples],
    ['activity.maxEntries', config.activity.maxEntries],
  ];
  for (const [key, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`${key} must be a positive number`);
    }
  }

  const nonNegative: Array<[string, number]> = [
    ['idle.thresholdMs', config.idle.thresholdMs],
    ['idle.networkBytesPerSecond', config.idle.networkBytesPerSecond],
    ['levels.changeCooldownMs', config.levels.changeCooldownMs],
    ['alerts.incidentDedupMs', config.alerts.incidentDedupMs],
    ['alerts.notificationCooldownMs', config.alerts.notificationCooldownMs],
  ];
  for (const [key, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      errors.push(`${key} cannot be negative`);
    }
  }

  if (!(config.idle.cpuPercent >= 0 && config.idle.cpuPercent <= 100)) {
    errors.push('idle.cpuPercent must be between 0 and 100');
  }

  if (!(config.baseline.smoothing > 0 && config.baseline.smoothing <= 1)) {
    errors.push('baseline.smoothing must be in (0, 1]');
  }

  if (!(config.baseline.multiplier >= 1)) {
    errors.push('baseline.multiplier must be at least 1');
  }

  return errors;
}
