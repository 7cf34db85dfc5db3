/**
 * AlertGate Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AlertGate, alertKeyFor, type LevelChange } from './alert-gate.js';
import type { Notifier } from './notifier.js';
import type { FactorName, ThreatFactor, ThreatLevel } from '../types/index.js';

const mockLogger = vi.hoisted(() => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => mockLogger),
}));

const uploadFactor: ThreatFactor = {
  name: 'totalUpload',
  score: 50,
  reason: 'Upload exceeded 100 MB limit (120 MB in the last hour)',
};

function change(to: ThreatLevel, at: number, factors: ThreatFactor[] = [uploadFactor], score = 50): LevelChange {
  return { from: 'normal', to, score, factors, at };
}

function factor(name: FactorName, score: number): ThreatFactor {
  return { name, score, reason: `${name} fired` };
}

describe('alertKeyFor', () => {
  it('should combine the level with the dominant factor', () => {
    expect(alertKeyFor('alert', [factor('thermal', 20), uploadFactor])).toBe('alert:totalUpload');
    expect(alertKeyFor('critical', [])).toBe('critical:unspecified');
  });
});

describe('AlertGate', () => {
  let notify: ReturnType<typeof vi.fn>;
  let gate: AlertGate;

  beforeEach(() => {
    vi.clearAllMocks();
    notify = vi.fn();
    const notifier: Notifier = { notify };
    gate = new AlertGate({ notificationCooldownMs: 300_000, maxActivityEntries: 50 }, notifier);
  });

  it('should log a warning without notifying', () => {
    const decision = gate.onLevelChange(change('warning', 0, [factor('surveillancePattern', 20)], 20));

    expect(decision).toEqual({ notified: false, reason: 'belowAlertLevel' });
    expect(notify).not.toHaveBeenCalled();
    expect(gate.getRecentActivity()[0]).toEqual(
      expect.objectContaining({
        type: 'warning',
        title: 'Elevated activity detected',
        description: 'surveillancePattern fired',
        level: 'warning',
        timestamp: 0,
      }),
    );
    expect(gate.isSuspicious()).toBe(true);
    expect(gate.getSuspiciousSince()).toBe(0);
  });

  it('should keep the start of a suspicious period while the level escalates', () => {
    gate.onLevelChange(change('warning', 10_000, [factor('surveillancePattern', 20)], 20));
    gate.onLevelChange(change('alert', 70_000));

    expect(gate.getSuspiciousSince()).toBe(10_000);

    gate.onLevelChange(change('normal', 130_000, [], 0));
    expect(gate.getSuspiciousSince()).toBeUndefined();
  });

  it('should notify when the level rises to alert', () => {
    const decision = gate.onLevelChange(change('alert', 1_000));

    const request = {
      title: 'Suspicious background activity',
      body: 'Upload exceeded 100 MB limit (120 MB in the last hour) (threat score 50)',
      severity: 'warning',
    };
    expect(decision).toEqual({ notified: true, alertKey: 'alert:totalUpload', request });
    expect(notify).toHaveBeenCalledWith(request);
    expect(gate.getActiveAlertKeys()).toEqual(['alert:totalUpload']);
  });

  it('should send critical notifications with critical severity', () => {
    gate.onLevelChange(change('critical', 0, [uploadFactor, factor('thermal', 20)], 70));

    expect(notify).toHaveBeenCalledWith({
      title: 'Critical threat detected',
      body: 'Upload exceeded 100 MB limit (120 MB in the last hour) (threat score 70)',
      severity: 'critical',
    });
  });

  it('should describe alerts without factors by their score', () => {
    gate.onLevelChange(change('alert', 0, [], 48));

    expect(notify).toHaveBeenCalledWith(expect.objectContaining({ body: 'Threat score 48 while the device was idle' }));
  });

  it('should hold back the same alert within the cooldown', () => {
    gate.onLevelChange(change('alert', 0));
    gate.onLevelChange(change('normal', 60_000, [], 0));

    const repeat = gate.onLevelChange(change('alert', 120_000));

    expect(repeat).toEqual({ notified: false, alertKey: 'alert:totalUpload', reason: 'cooldown' });
    expect(notify).toHaveBeenCalledTimes(1);
    expect(gate.onLevelChange(change('alert', 300_000)).notified).toBe(true);
    expect(notify).toHaveBeenCalledTimes(2);
  });

  it('should treat a different dominant factor as a new alert', () => {
    gate.onLevelChange(change('alert', 0));

    const decision = gate.onLevelChange(change('alert', 60_000, [factor('idleCpu', 25), factor('batteryDrain', 20)]));

    expect(decision.notified).toBe(true);
    expect(decision.alertKey).toBe('alert:idleCpu');
  });

  it('should clear suspicion when the level returns to normal', () => {
    gate.onLevelChange(change('alert', 0));

    const decision = gate.onLevelChange(change('normal', 60_000, [], 0));

    expect(decision).toEqual({ notified: false, reason: 'returnedToNormal' });
    expect(gate.isSuspicious()).toBe(false);
    expect(gate.getActiveAlertKeys()).toEqual([]);
    expect(gate.getRecentActivity()[0].description).toBe('Activity back within normal limits');
  });

  it('should keep scoring when the notifier throws', () => {
    notify.mockImplementation(() => {
      throw new Error('no permission');
    });

    const decision = gate.onLevelChange(change('alert', 0));

    expect(decision.notified).toBe(true);
    expect(mockLogger.error).toHaveBeenCalledWith('Notification delivery failed', {
      alertKey: 'alert:totalUpload',
      error: 'Error: no permission',
    });
  });

  it('should log a notifier that rejects', async () => {
    notify.mockImplementation(() => Promise.reject(new Error('offline')));

    gate.onLevelChange(change('critical', 0, [uploadFactor], 80));

    await vi.waitFor(() => {
      expect(mockLogger.error).toHaveBeenCalledWith('Notification delivery failed', {
        alertKey: 'critical:totalUpload',
        error: 'Error: offline',
      });
    });
  });

  it('should emit notifications even without a notifier', () => {
    const quiet = new AlertGate({ notificationCooldownMs: 300_000, maxActivityEntries: 50 });
    const listener = vi.fn();
    quiet.on('notification', listener);

    quiet.onLevelChange(change('alert', 0));

    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ severity: 'warning' }));
  });

  it('should keep the newest activity entries up to the cap', () => {
    for (let i = 0; i < 60; i++) {
      gate.addActivity({ type: 'normal', title: `entry ${i}`, description: '', level: 'normal', timestamp: i });
    }

    const activity = gate.getRecentActivity();
    expect(activity).toHaveLength(50);
    expect(activity[0].title).toBe('entry 59');
    expect(activity[49].title).toBe('entry 10');
  });
});
