/**
 * Port for terminating the current process.
 * Only the CLI composition root uses it.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
