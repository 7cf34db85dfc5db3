/**
 * Idle Detector
 *
 * Decides whether the device is unattended. Idle needs both a quiet period
 * without user interaction and low instantaneous CPU or network activity.
 * Any interaction flips the state back to active at once.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { GuardConfiguration } from '../types/index.js';

export type IdleSettings = GuardConfiguration['idle'];

/**
 * Pure idle test for one moment in time.
 *
 * Idle when `now - lastInteractionAt >= thresholdMs` and either CPU or the
 * busier network direction is below its quiet limit.
 */
export function evaluateIdle(
  settings: IdleSettings,
  now: number,
  lastInteractionAt: number,
  cpuPercent: number,
  uploadBytesPerSecond: number,
  downloadBytesPerSecond: number,
): boolean {
  if (now - lastInteractionAt < settings.thresholdMs) {
    return false;
  }
  const cpuQuiet = cpuPercent < settings.cpuPercent;
  const networkQuiet = Math.max(uploadBytesPerSecond, downloadBytesPerSecond) < settings.networkBytesPerSecond;
  return cpuQuiet || networkQuiet;
}

/**
 * Whether activity is low on both CPU and network. Baselines only learn from
 * these samples.
 */
export function isQuiet(
  settings: IdleSettings,
  cpuPercent: number,
  uploadBytesPerSecond: number,
  downloadBytesPerSecond: number,
): boolean {
  return (
    cpuPercent < settings.cpuPercent &&
    Math.max(uploadBytesPerSecond, downloadBytesPerSecond) < settings.networkBytesPerSecond
  );
}

export class IdleDetector {
  private readonly logger = createSubsystemLogger('guard/idle');
  private readonly settings: IdleSettings;
  private lastInteractionAt: number;
  private idle = false;
  private idleSince?: number;

  constructor(settings: IdleSettings, startedAt: number) {
    this.settings = { ...settings };
    this.lastInteractionAt = startedAt;
  }

  /**
   * Registers a user interaction. Overrides whatever the metrics say.
   */
  recordInteraction(at: number): void {
    if (at > this.lastInteractionAt) {
      this.lastInteractionAt = at;
    }
    if (this.idle) {
      this.logger.debug('Device active again', {
        idleForMs: this.idleSince === undefined ? 0 : at - this.idleSince,
      });
    }
    this.idle = false;
    this.idleSince = undefined;
  }

  /**
   * Re-evaluates idle state from the latest metrics
   */
  evaluate(now: number, cpuPercent: number, uploadBytesPerSecond: number, downloadBytesPerSecond: number): boolean {
    const idle = evaluateIdle(
      this.settings,
      now,
      this.lastInteractionAt,
      cpuPercent,
      uploadBytesPerSecond,
      downloadBytesPerSecond,
    );

    if (idle && !this.idle) {
      this.idleSince = now;
      this.logger.info('Device entered idle state', {
        sinceInteractionMs: now - this.lastInteractionAt,
        cpuPercent,
        uploadBytesPerSecond,
        downloadBytesPerSecond,
      });
    } else if (!idle && this.idle) {
      this.idleSince = undefined;
      this.logger.debug('Idle state ended by activity', { cpuPercent, uploadBytesPerSecond, downloadBytesPerSecond });
    }

    this.idle = idle;
    return idle;
  }

  isQuiet(cpuPercent: number, uploadBytesPerSecond: number, downloadBytesPerSecond: number): boolean {
    return isQuiet(this.settings, cpuPercent, uploadBytesPerSecond, downloadBytesPerSecond);
  }

  isIdle(): boolean {
    return this.idle;
  }

  getLastInteractionAt(): number {
    return this.lastInteractionAt;
  }

  getIdleSince(): number | undefined {
    return this.idleSince;
  }

  /**
   * Seconds since the last interaction while idle, zero while active
   */
  getIdleDurationSeconds(now: number): number {
    if (!this.idle) {
      return 0;
    }
    return Math.max(0, now - this.lastInteractionAt) / 1000;
  }
}
