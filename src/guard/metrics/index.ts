export * from './sample-cache.js';
