/**
 * Alert Gate Component
 *
 * Activity log, notification cooldowns and delivery for level changes.
 */

export * from './alert-gate.js';
export * from './notifier.js';
