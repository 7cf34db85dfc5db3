/**
 * Idle Threat Guard - Type Definitions
 */

export * from './metric-snapshot.js';
export * from './alert-threshold.js';
export * from './threat.js';
export * from './incident.js';
export * from './activity.js';
export * from './guard-configuration.js';
