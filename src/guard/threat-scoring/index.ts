/**
 * Threat Scoring Component
 *
 * Multi-factor weighted scoring of idle-time device activity.
 */

export * from './threat-scoring.js';
