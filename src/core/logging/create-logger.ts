import pino from 'pino';
import { singleton } from 'tsyringe';
import { parseLogLevel } from './types.js';
import type { Logger, ILoggerFactory } from './types.js';

/**
 * Root logger: JSON lines on stderr, written synchronously so output survives
 * a CLI exiting right after the last call. stdout is reserved for command output.
 *
 * LOCATOR_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent (default)
 */
export function createRootLogger(): Logger {
  return pino(
    {
      level: parseLogLevel(process.env['LOCATOR_LOG_LEVEL']),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
