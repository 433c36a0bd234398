/**
 * Versions Command
 *
 * Lists the versions of one content object and, optionally, what a purge
 * would remove or compress. Reports only; nothing is changed on disk.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, success } from '../types/cli-result.js';
import type { VersionedFile } from '../../locator/version-selector.js';
import type { PurgeCandidates, PurgeStrategy, VersionListQuery } from '../../maintenance/data-maintenance.js';
import { withLocatorGuard } from './guard.js';

export interface VersionsCommandDeps {
  readonly getVersionFileList: (query: VersionListQuery) => readonly VersionedFile[];
  readonly getPurgeCandidates: (query: VersionListQuery, strategy: PurgeStrategy) => PurgeCandidates;
}

export function executeVersionsCommand(
  query: VersionListQuery,
  options: { readonly purge?: PurgeStrategy },
  deps: VersionsCommandDeps
): CliResult {
  return withLocatorGuard(() => {
    const files = deps.getVersionFileList(query);
    if (files.length === 0) {
      return failure(`No versions found for ${query.dataSetId} ${query.contentType ?? 'model'}`);
    }

    const details = files.map((f) => `V${f.version}  ${f.filePath}`);
    if (options.purge === undefined) {
      return success({ message: `${files.length} version${files.length === 1 ? '' : 's'}`, details });
    }

    const candidates = deps.getPurgeCandidates(query, options.purge);
    return success({
      message: `${files.length} version${files.length === 1 ? '' : 's'} (purge strategy ${options.purge})`,
      details: [
        ...details,
        `keep: ${candidates.latest ?? '-'}`,
        ...candidates.remove.map((p) => `remove: ${p}`),
        ...candidates.compress.map((p) => `compress: ${p}`),
      ],
    });
  });
}
