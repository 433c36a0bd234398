import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Typed exit codes for CLI commands (standard Unix conventions).
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - successful execution
  | { kind: 'general_error' }  // 1 - nothing resolved, invalid names
  | { kind: 'misuse' };        // 2 - bad arguments, unknown storage class

export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
    default:
      return assertNever(exitCode);
  }
}

/**
 * Numeric value for raw process.exit(), where the container could not be built.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    default:
      return assertNever(exitCode);
  }
}
