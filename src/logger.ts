import { getRootLogger } from './logging/subsystem.js';

export function logWarn(message: string): void {
  getRootLogger().warn(message);
}

export function logError(message: string): void {
  getRootLogger().error(message);
}
