export * from './baseline-learner.js';
