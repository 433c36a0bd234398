import type { Logger as PinoLogger } from 'pino';

/**
 * Pino's logger type, used directly.
 *
 * Data-first call style:
 *   logger.debug({ dirPath }, 'No versions present');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === candidate) ?? 'silent';
}
