/**
 * CLI Result Types
 *
 * Commands return these; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output for CLI display.
 * `plain` output is printed undecorated, one value per line, for use in scripts.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
  readonly plain?: boolean;
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

/** Success whose only output is a bare value (a path, a filename). */
export function successPlain(message: string, details?: readonly string[]): CliResult {
  return { kind: 'success', output: { message, details, plain: true } };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Failure caused by bad arguments.
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
