export * from './threshold-store.js';
