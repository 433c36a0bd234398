/**
 * Release Path Command
 *
 * Prints a directory of the for-release staging area.
 */

import type { CliResult } from '../types/cli-result.js';
import { successPlain } from '../types/cli-result.js';
import type { ForReleaseQuery } from '../../release/release-path-info.js';
import { withLocatorGuard } from './guard.js';

export interface ReleasePathCommandDeps {
  readonly getForReleasePath: (query: ForReleaseQuery) => string;
}

export function executeReleasePathCommand(query: ForReleaseQuery, deps: ReleasePathCommandDeps): CliResult {
  return withLocatorGuard(() => successPlain(deps.getForReleasePath(query)));
}
