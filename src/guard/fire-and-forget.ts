import type { LogMeta, SubsystemLogger } from '../logging/subsystem.js';

/**
 * Runs a collaborator call once without waiting on it. Synchronous throws and
 * rejected promises are logged and dropped; nothing is retried.
 */
export function fireAndForget(
  logger: SubsystemLogger,
  failureMessage: string,
  meta: LogMeta,
  call: () => void | Promise<void>,
): void {
  const logFailure = (error: unknown): void => {
    logger.error(failureMessage, { ...meta, error: String(error) });
  };

  try {
    const result = call();
    if (result instanceof Promise) {
      result.catch(logFailure);
    }
  } catch (error) {
    logFailure(error);
  }
}
