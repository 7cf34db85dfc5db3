/**
 * Property-Based Tests for the level state machine
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { LevelStateMachine, levelForScore, levelRank } from './level-state-machine.js';
import { propertyTestConfig } from '../test-setup.js';

const score = fc.double({ min: 0, max: 100, noNaN: true });

describe('Level State Machine Property-Based Tests', () => {
  it('should map higher scores to equal or higher levels', () => {
    fc.assert(
      fc.property(score, score, (a, b) => {
        const [low, high] = a <= b ? [a, b] : [b, a];

        expect(levelRank(levelForScore(low))).toBeLessThanOrEqual(levelRank(levelForScore(high)));
      }),
      propertyTestConfig,
    );
  });

  it('should never accept two changes closer together than the cooldown', () => {
    fc.assert(
      fc.property(
        fc.array(fc.record({ score, step: fc.integer({ min: 0, max: 90_000 }) }), { minLength: 1, maxLength: 60 }),
        (ticks) => {
          const machine = new LevelStateMachine(60_000, 0);
          let now = 0;
          let lastChange = 0;

          for (const tick of ticks) {
            now += tick.step;
            const update = machine.update(tick.score, now);
            if (update.changed) {
              expect(now - lastChange).toBeGreaterThanOrEqual(60_000);
              lastChange = now;
            }
            expect(update.proposedLevel).toBe(levelForScore(tick.score));
            expect(machine.getScore()).toBe(tick.score);
          }
        },
      ),
      propertyTestConfig,
    );
  });

  it('should settle on the score level once the cooldown has passed', () => {
    fc.assert(
      fc.property(score, score, (first, second) => {
        const machine = new LevelStateMachine(60_000, 0);
        machine.update(first, 60_000);

        expect(machine.update(second, 120_000).level).toBe(levelForScore(second));
      }),
      propertyTestConfig,
    );
  });
});
