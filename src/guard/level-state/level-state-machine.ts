/**
 * Level State Machine
 *
 * Maps the raw score onto four ordinal levels and debounces the label: a
 * level change is only accepted once the previous change is at least
 * `changeCooldownMs` old. The score itself is always taken as-is.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import { THREAT_LEVELS, type ThreatLevel } from '../types/index.js';

/** Inclusive lower score bound of each level */
export const LEVEL_LOWER_BOUNDS: Readonly<Record<ThreatLevel, number>> = {
  normal: 0,
  warning: 20,
  alert: 45,
  critical: 70,
};

export const LEVEL_MESSAGES: Readonly<Record<ThreatLevel, string>> = {
  normal: 'Your device is secure',
  warning: 'Elevated activity detected',
  alert: 'Suspicious activity detected',
  critical: 'Critical threat detected',
};

/**
 * Level for a score, ignoring hysteresis. Normal [0,20), Warning [20,45),
 * Alert [45,70), Critical [70,100].
 */
export function levelForScore(score: number): ThreatLevel {
  if (!(score >= LEVEL_LOWER_BOUNDS.warning)) {
    return 'normal';
  }
  if (score < LEVEL_LOWER_BOUNDS.alert) {
    return 'warning';
  }
  if (score < LEVEL_LOWER_BOUNDS.critical) {
    return 'alert';
  }
  return 'critical';
}

export function levelRank(level: ThreatLevel): number {
  return THREAT_LEVELS.indexOf(level);
}

export interface LevelUpdate {
  score: number;
  /** Externally visible level after this update */
  level: ThreatLevel;
  previousLevel: ThreatLevel;
  /** Level the score alone maps to */
  proposedLevel: ThreatLevel;
  changed: boolean;
  /** A different level was proposed but the cooldown kept the old one */
  held: boolean;
}

export class LevelStateMachine {
  private readonly logger = createSubsystemLogger('guard/levels');
  private readonly changeCooldownMs: number;
  private level: ThreatLevel = 'normal';
  private score = 0;
  private lastChangeAt: number;

  /**
   * @param startedAt session start; the cooldown clock runs from here
   */
  constructor(changeCooldownMs: number, startedAt: number) {
    this.changeCooldownMs = changeCooldownMs;
    this.lastChangeAt = startedAt;
  }

  update(score: number, now: number): LevelUpdate {
    const previousLevel = this.level;
    const proposedLevel = levelForScore(score);
    this.score = score;

    if (proposedLevel === previousLevel) {
      return { score, level: previousLevel, previousLevel, proposedLevel, changed: false, held: false };
    }

    if (now - this.lastChangeAt < this.changeCooldownMs) {
      this.logger.debug('Level change held by cooldown', {
        from: previousLevel,
        to: proposedLevel,
        score,
        sinceLastChangeMs: now - this.lastChangeAt,
      });
      return { score, level: previousLevel, previousLevel, proposedLevel, changed: false, held: true };
    }

    this.level = proposedLevel;
    this.lastChangeAt = now;

    const meta = { from: previousLevel, to: proposedLevel, score };
    if (proposedLevel === 'normal') {
      this.logger.info('Threat level changed', meta);
    } else {
      this.logger.warn('Threat level changed', meta);
    }

    return { score, level: proposedLevel, previousLevel, proposedLevel, changed: true, held: false };
  }

  getLevel(): ThreatLevel {
    return this.level;
  }

  getScore(): number {
    return this.score;
  }

  getLastChangeAt(): number {
    return this.lastChangeAt;
  }
}
