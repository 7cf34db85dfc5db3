/**
 * Idle Threat Guard
 *
 * On-device, idle-aware anomaly detection for background network, CPU,
 * battery and thermal activity.
 */

export * from './types/index.js';
export * from './configuration.js';
export * from './idle-detector/index.js';
export * from './baseline-learner/index.js';
export * from './rolling-window/index.js';
export * from './thresholds/index.js';
export * from './metrics/index.js';
export * from './threat-scoring/index.js';
export * from './level-state/index.js';
export * from './incidents/index.js';
export * from './alert-gate/index.js';
export * from './scheduling/index.js';
export * from './guard-engine.js';
