/**
 * Chemical Reference Command
 *
 * Prints the repository path of a chemical reference definition file.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, successPlain } from '../types/cli-result.js';
import type { ChemRefIdType } from '../../types/chem-ref-id-type.js';

export interface ChemRefCommandDeps {
  readonly getIdType: (idCode: string) => ChemRefIdType | null;
  readonly getFilePath: (idCode: string) => string | null;
}

export function executeChemRefCommand(idCode: string, deps: ChemRefCommandDeps): CliResult {
  const idType = deps.getIdType(idCode);
  if (idType === null) {
    return misuse(`Not a reference data id: ${idCode}`, [
      'Components have up to five characters; others start with PRD_, PRDCC_ or FAM_',
    ]);
  }
  const filePath = deps.getFilePath(idCode);
  if (filePath === null) {
    return failure(`No repository path for ${idCode} (${idType})`, {
      suggestions: ['Set SITE_REFDATA_SANDBOX_PATH to the reference data sandbox'],
    });
  }
  return successPlain(filePath);
}
