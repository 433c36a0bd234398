/**
 * Path Command
 *
 * Prints the full path (or only the directory) of a managed file.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, successPlain } from '../types/cli-result.js';
import type { FileQuery } from '../../locator/path-info.js';
import { withLocatorGuard } from './guard.js';

export interface PathCommandDeps {
  readonly getFilePath: (query: FileQuery) => string | null;
}

export interface DirCommandDeps {
  readonly getDirPath: (query: Pick<FileQuery, 'dataSetId' | 'storageClass' | 'workflowInstanceId'>) => string | null;
}

export function executePathCommand(query: FileQuery, deps: PathCommandDeps): CliResult {
  return withLocatorGuard(() => {
    const filePath = deps.getFilePath(query);
    if (filePath === null) {
      return failure(`No file path for ${query.dataSetId} ${query.contentType ?? '?'}/${query.formatType ?? '?'}`, {
        details: [
          `storage class: ${query.storageClass ?? 'archive'}`,
          `version: ${String(query.version ?? 'latest')}`,
          `partition: ${String(query.partition ?? 1)}`,
        ],
        suggestions: [
          'Check the content type and format names',
          'A symbolic version (latest, previous) needs matching files in the directory',
        ],
      });
    }
    return successPlain(filePath);
  });
}

export function executeDirCommand(
  query: Pick<FileQuery, 'dataSetId' | 'storageClass' | 'workflowInstanceId'>,
  deps: DirCommandDeps
): CliResult {
  return withLocatorGuard(() => {
    const dirPath = deps.getDirPath(query);
    if (dirPath === null) {
      return failure(`No directory for ${query.dataSetId} in ${query.storageClass ?? 'archive'}`, {
        suggestions: ['wf-instance needs --instance; dataset ids look like D_1000000001'],
      });
    }
    return successPlain(dirPath);
  });
}
