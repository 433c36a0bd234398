import type { CliResult } from '../types/cli-result.js';
import { misuse } from '../types/cli-result.js';
import { isLocatorError } from '../../core/error-handler.js';

/**
 * Runs a command body, turning a rejected storage class or release-area
 * name into a misuse result. Anything else propagates.
 */
export function withLocatorGuard(run: () => CliResult): CliResult {
  try {
    return run();
  } catch (e) {
    if (isLocatorError(e)) return misuse(e.message);
    throw e;
  }
}
