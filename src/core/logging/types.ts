import type { Logger as PinoLogger, LevelWithSilent } from 'pino';

/**
 * pino's logger, used directly. Data first, message second:
 *   logger.debug({ file, hash, changed }, 'Hashed auxiliary file');
 */
export type Logger = PinoLogger;

export type LogLevel = LevelWithSilent;

/**
 * Hands out per-component child loggers that share one root.
 */
export interface ILoggerFactory {
  create(component: string): Logger;
  readonly root: Logger;
}
