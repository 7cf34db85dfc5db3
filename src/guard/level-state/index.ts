export * from './level-state-machine.js';
