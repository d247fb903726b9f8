/**
 * Subsystem Logging
 *
 * Thin wrapper over pino that tags every record with the subsystem that
 * emitted it. Components create one logger at module scope:
 *
 *   const log = createSubsystemLogger('radio/state-store');
 *   log.info('State written', { path, keys: 3 });
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(name: string): SubsystemLogger;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(raw: string | undefined): LevelWithSilent {
  const level = raw?.trim().toLowerCase();
  return LEVELS.find(candidate => candidate === level) ?? 'info';
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'radio',
      level: resolveLevel(process.env.RADIO_LOG_LEVEL),
    });
  }
  return rootLogger;
}

function wrap(subsystem: string, logger: Logger): SubsystemLogger {
  return {
    subsystem,
    debug: (message, meta) => logger.debug(meta ?? {}, message),
    info: (message, meta) => logger.info(meta ?? {}, message),
    warn: (message, meta) => logger.warn(meta ?? {}, message),
    error: (message, meta) => logger.error(meta ?? {}, message),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}

/**
 * Creates a logger bound to a subsystem name
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(subsystem, getRootLogger().child({ subsystem }));
}

/**
 * Normalizes a caught value into log metadata
 */
export function errorMeta(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}
