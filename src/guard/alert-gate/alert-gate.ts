/**
 * Alert Gate
 *
 * Decides what a user gets to see when the threat level changes. Every
 * accepted change lands in the activity log; only changes into Alert or
 * Critical are pushed as notifications, and a repeat of the same alert
 * identity is dropped for `notificationCooldownMs`. Delivery is attempted
 * once and never blocks scoring.
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { fireAndForget } from '../fire-and-forget.js';
import { dominantFactor } from '../threat-scoring/index.js';
import { LEVEL_MESSAGES } from '../level-state/index.js';
import type { ActivityEntry, ActivityType, ThreatFactor, ThreatLevel } from '../types/index.js';
import type { NotificationRequest, Notifier } from './notifier.js';

export interface AlertGateSettings {
  notificationCooldownMs: number;
  maxActivityEntries: number;
}

export interface LevelChange {
  from: ThreatLevel;
  to: ThreatLevel;
  score: number;
  factors: readonly ThreatFactor[];
  at: number;
}

export type GateDecision =
  | { notified: true; alertKey: string; request: NotificationRequest }
  | { notified: false; alertKey?: string; reason: 'belowAlertLevel' | 'cooldown' | 'returnedToNormal' };

const ACTIVITY_TYPE_BY_LEVEL: Readonly<Record<ThreatLevel, ActivityType>> = {
  normal: 'normal',
  warning: 'warning',
  alert: 'alert',
  critical: 'critical',
};

/**
 * Identity used for notification cooldowns: the level plus the factor
 * driving it
 */
export function alertKeyFor(level: ThreatLevel, factors: readonly ThreatFactor[]): string {
  return `${level}:${dominantFactor(factors)?.name ?? 'unspecified'}`;
}

export class AlertGate extends EventEmitter {
  private readonly logger = createSubsystemLogger('guard/alerts');
  private readonly settings: AlertGateSettings;
  private readonly notifier?: Notifier;
  private lastNotifiedAt = new Map<string, number>();
  private activity: ActivityEntry[] = [];
  private suspiciousSince?: number;
  private activeAlertKeys = new Set<string>();

  constructor(settings: AlertGateSettings, notifier?: Notifier) {
    super();
    this.settings = { ...settings };
    this.notifier = notifier;
  }

  /**
   * Handles one accepted level change
   */
  onLevelChange(change: LevelChange): GateDecision {
    const description = change.factors.length > 0
      ? change.factors.map((factor) => factor.reason).join(', ')
      : change.to === 'normal' ? 'Activity back within normal limits' : 'Various indicators';

    this.addActivity({
      type: ACTIVITY_TYPE_BY_LEVEL[change.to],
      title: LEVEL_MESSAGES[change.to],
      description,
      level: change.to,
      timestamp: change.at,
    });

    if (change.to === 'normal') {
      this.suspiciousSince = undefined;
      this.activeAlertKeys.clear();
      return { notified: false, reason: 'returnedToNormal' };
    }

    if (this.suspiciousSince === undefined) {
      this.suspiciousSince = change.at;
    }

    if (change.to === 'warning') {
      return { notified: false, reason: 'belowAlertLevel' };
    }

    const alertKey = alertKeyFor(change.to, change.factors);
    const last = this.lastNotifiedAt.get(alertKey);
    if (last !== undefined && change.at - last < this.settings.notificationCooldownMs) {
      this.logger.debug('Notification suppressed by cooldown', { alertKey, sinceLastMs: change.at - last });
      return { notified: false, alertKey, reason: 'cooldown' };
    }

    const request = this.buildRequest(change);
    this.lastNotifiedAt.set(alertKey, change.at);
    this.activeAlertKeys.add(alertKey);
    this.dispatch(alertKey, request);
    return { notified: true, alertKey, request };
  }

  /**
   * Appends an entry to the activity log, newest first
   */
  addActivity(entry: Omit<ActivityEntry, 'id'>): ActivityEntry {
    const full: ActivityEntry = { id: randomUUID(), ...entry };
    this.activity.unshift(full);
    if (this.activity.length > this.settings.maxActivityEntries) {
      this.activity.length = this.settings.maxActivityEntries;
    }
    this.emit('activity', full);
    return full;
  }

  getRecentActivity(): ActivityEntry[] {
    return [...this.activity];
  }

  isSuspicious(): boolean {
    return this.suspiciousSince !== undefined;
  }

  getSuspiciousSince(): number | undefined {
    return this.suspiciousSince;
  }

  getActiveAlertKeys(): string[] {
    return [...this.activeAlertKeys];
  }

  private buildRequest(change: LevelChange): NotificationRequest {
    const lead = dominantFactor(change.factors);
    return {
      title: change.to === 'critical' ? 'Critical threat detected' : 'Suspicious background activity',
      body: lead
        ? `${lead.reason} (threat score ${change.score})`
        : `Threat score ${change.score} while the device was idle`,
      severity: change.to === 'critical' ? 'critical' : 'warning',
    };
  }

  private dispatch(alertKey: string, request: NotificationRequest): void {
    this.logger.info('Dispatching notification', { alertKey, severity: request.severity, title: request.title });
    this.emit('notification', request);

    const notifier = this.notifier;
    if (!notifier) {
      return;
    }
    fireAndForget(this.logger, 'Notification delivery failed', { alertKey }, () => notifier.notify(request));
  }
}
