import pino from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

/**
 * Create the root pino logger instance.
 *
 * - Sync output to stderr: stdout carries the engine transcript on failure
 * - JSON format for machine parsing
 */
function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 * One instance per process, registered by the container.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}

/**
 * Logger that drops everything. For tests and library callers that do not log.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
