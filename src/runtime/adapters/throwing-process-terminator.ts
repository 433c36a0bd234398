import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process, so an accidental terminate() fails the test instead.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
