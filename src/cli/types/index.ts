export type { ExitCode } from './exit-code.js';
export { toProcessExitCode, toNumericExitCode } from './exit-code.js';

export type { CliOutput, CliResult } from './cli-result.js';
export { success, successPlain, failure, misuse } from './cli-result.js';
