export * from './incident-registry.js';
