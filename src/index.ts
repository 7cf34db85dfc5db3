export * from './guard/index.js';
export { createSubsystemLogger, type SubsystemLogger, type LogLevelName } from './logging/subsystem.js';
