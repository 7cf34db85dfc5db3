/**
 * Subsystem Logging
 *
 * Thin wrapper over tslog that hands each component its own named child
 * logger. Level and output format are read once from the environment:
 *
 * - `GUARD_LOG_LEVEL`: trace | debug | info | warn | error | fatal | silent
 * - `GUARD_LOG_FORMAT`: pretty | json
 */

import { Logger, type ILogObj } from 'tslog';

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  child(name: string): SubsystemLogger;
}

const LEVEL_IDS: Record<Exclude<LogLevelName, 'silent'>, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function parseLogLevel(value: string | undefined): LogLevelName {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
    case 'silent':
      return normalized;
    default:
      return 'info';
  }
}

function createRootLogger(): Logger<ILogObj> {
  const level = parseLogLevel(process.env.GUARD_LOG_LEVEL);
  const format = process.env.GUARD_LOG_FORMAT === 'json' ? 'json' : 'pretty';

  return new Logger<ILogObj>({
    name: 'guard',
    type: level === 'silent' ? 'hidden' : format,
    minLevel: level === 'silent' ? LEVEL_IDS.fatal : LEVEL_IDS[level],
  });
}

let rootLogger: Logger<ILogObj> | undefined;

export function getRootLogger(): Logger<ILogObj> {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

function wrap(subsystem: string, logger: Logger<ILogObj>): SubsystemLogger {
  const emit = (method: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal') =>
    (message: string, meta?: LogMeta): void => {
      if (meta) {
        logger[method](message, meta);
      } else {
        logger[method](message);
      }
    };

  return {
    subsystem,
    trace: emit('trace'),
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    fatal: emit('fatal'),
    child: (name: string) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}

/**
 * Creates a logger tagged with the given subsystem name, e.g. `guard/idle`.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(subsystem, getRootLogger().getSubLogger({ name: subsystem }));
}
