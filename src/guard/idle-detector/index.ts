/**
 * Idle Detector Component
 *
 * Tracks user interaction and low-activity periods to decide when the device is unattended.
 */

export * from './idle-detector.js';
