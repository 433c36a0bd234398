import pino from 'pino';
import type { LevelWithSilent } from 'pino';
import type { ILoggerFactory, Logger } from '../../src/core/logging/index.js';

export interface CapturedLog {
  readonly level: number;
  readonly component?: string;
  readonly msg?: string;
  readonly [key: string]: unknown;
}

function isCapturedLog(value: unknown): value is CapturedLog {
  return typeof value === 'object' && value !== null && 'level' in value && typeof value.level === 'number';
}

/**
 * Real pino logger writing JSON lines into memory, so tests can assert on
 * what was logged without a mock.
 */
export class CapturingLoggerFactory implements ILoggerFactory {
  readonly entries: CapturedLog[] = [];
  readonly root: Logger;

  constructor(level: LevelWithSilent = 'debug') {
    this.root = pino(
      { level, base: undefined, timestamp: false },
      {
        write: (line: string) => {
          const parsed: unknown = JSON.parse(line);
          if (isCapturedLog(parsed)) this.entries.push(parsed);
        },
      }
    );
  }

  create(component: string): Logger {
    return this.root.child({ component });
  }

  messages(): string[] {
    return this.entries.flatMap((e) => (typeof e.msg === 'string' ? [e.msg] : []));
  }
}
