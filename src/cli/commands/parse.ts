/**
 * Parse / Validate Commands
 *
 * Decompose managed filenames and check them against the naming grammar.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, success } from '../types/cli-result.js';
import { formatKeyValue } from '../output-formatter.js';
import type { FileNameInfo } from '../../locator/path-info.js';

export interface ParseCommandDeps {
  readonly parseFileName: (fileName: string) => FileNameInfo;
  readonly splitFileName: (fileName: string) => FileNameInfo;
}

export interface ValidateCommandDeps {
  readonly isValidFileName: (fileName: string, requireVersion: boolean) => boolean;
}

function describe(info: FileNameInfo): readonly string[] {
  return [
    formatKeyValue('dataSetId', info.dataSetId),
    formatKeyValue('contentType', info.contentType),
    formatKeyValue('formatType', info.formatType),
    formatKeyValue('partition', info.partition),
    formatKeyValue('version', info.version),
  ];
}

/**
 * Full parse first; with `partial`, fall back to best-effort splitting.
 */
export function executeParseCommand(
  fileName: string,
  options: { readonly partial?: boolean },
  deps: ParseCommandDeps
): CliResult {
  const parsed = deps.parseFileName(fileName);
  if (parsed.dataSetId !== null) {
    return success({ message: fileName, details: describe(parsed) });
  }

  if (options.partial) {
    const split = deps.splitFileName(fileName);
    return success({
      message: `${fileName} (partial)`,
      details: describe(split),
      warnings: ['Name does not follow {id}_{type}_P{n}.{ext}.V{n}; fields shown were recovered individually'],
    });
  }

  return failure(`Not a managed filename: ${fileName}`, {
    suggestions: ['Expected {dataSetId}_{contentType}_P{partition}.{extension}.V{version}', 'Use --partial to split it anyway'],
  });
}

export function executeValidateCommand(
  fileNames: readonly string[],
  options: { readonly requireVersion: boolean },
  deps: ValidateCommandDeps
): CliResult {
  const invalid = fileNames.filter((f) => !deps.isValidFileName(f, options.requireVersion));
  if (invalid.length > 0) {
    return failure(`${invalid.length} of ${fileNames.length} filename${fileNames.length === 1 ? '' : 's'} invalid`, {
      details: invalid,
    });
  }
  return success({ message: `${fileNames.length} filename${fileNames.length === 1 ? '' : 's'} valid` });
}
