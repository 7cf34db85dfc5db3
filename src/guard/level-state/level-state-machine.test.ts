/**
 * LevelStateMachine Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LevelStateMachine, levelForScore, levelRank } from './level-state-machine.js';

describe('levelForScore', () => {
  it.each([
    [0, 'normal'],
    [19, 'normal'],
    [19.9, 'normal'],
    [20, 'warning'],
    [44, 'warning'],
    [45, 'alert'],
    [69, 'alert'],
    [70, 'critical'],
    [100, 'critical'],
  ] as const)('should map %s to %s', (score, level) => {
    expect(levelForScore(score)).toBe(level);
  });

  it('should treat NaN and negative scores as normal', () => {
    expect(levelForScore(Number.NaN)).toBe('normal');
    expect(levelForScore(-10)).toBe('normal');
  });
});

describe('levelRank', () => {
  it('should order levels by severity', () => {
    expect(levelRank('normal')).toBeLessThan(levelRank('warning'));
    expect(levelRank('warning')).toBeLessThan(levelRank('alert'));
    expect(levelRank('alert')).toBeLessThan(levelRank('critical'));
  });
});

describe('LevelStateMachine', () => {
  let machine: LevelStateMachine;

  beforeEach(() => {
    machine = new LevelStateMachine(60_000, 0);
  });

  it('should start normal', () => {
    expect(machine.getLevel()).toBe('normal');
    expect(machine.getScore()).toBe(0);
    expect(machine.getLastChangeAt()).toBe(0);
  });

  it('should hold a score flickering around a boundary inside the first minute', () => {
    const updates = [
      machine.update(18, 0),
      machine.update(22, 10_000),
      machine.update(19, 20_000),
      machine.update(23, 30_000),
    ];

    expect(updates.map((update) => update.level)).toEqual(['normal', 'normal', 'normal', 'normal']);
    expect(updates.map((update) => update.held)).toEqual([false, true, false, true]);
    expect(machine.getScore()).toBe(23);
  });

  it('should accept a change once the cooldown has passed', () => {
    const update = machine.update(50, 60_000);

    expect(update).toEqual({
      score: 50,
      level: 'alert',
      previousLevel: 'normal',
      proposedLevel: 'alert',
      changed: true,
      held: false,
    });
    expect(machine.getLastChangeAt()).toBe(60_000);
  });

  it('should restart the cooldown after each accepted change', () => {
    machine.update(50, 60_000);

    expect(machine.update(10, 70_000).level).toBe('alert');
    expect(machine.update(10, 119_999).level).toBe('alert');

    const update = machine.update(10, 120_000);
    expect(update.changed).toBe(true);
    expect(update.level).toBe('normal');
  });

  it('should report the raw score even while the level is held', () => {
    machine.update(50, 60_000);

    const update = machine.update(95, 61_000);

    expect(update.score).toBe(95);
    expect(update.proposedLevel).toBe('critical');
    expect(update.level).toBe('alert');
  });

  it('should change immediately with a zero cooldown', () => {
    const eager = new LevelStateMachine(0, 0);

    expect(eager.update(75, 0).level).toBe('critical');
    expect(eager.update(0, 0).level).toBe('normal');
  });
});
