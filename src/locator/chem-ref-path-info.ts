import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ValidatedSiteConfig, RefDataConfig } from '../config/site-config.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { ChemRefIdType } from '../types/chem-ref-id-type.js';
import { assertNever } from '../runtime/assert-never.js';

export interface ChemRefProjectInfo {
  readonly projectName: string;
  /** Location of the definition file inside the checked-out project. */
  readonly relativePath: string;
}

/** Ids up to five characters are chemical components; longer ones carry a type prefix. */
export function getIdType(idCode: string | null | undefined): ChemRefIdType | null {
  if (!idCode) return null;
  const id = idCode.toUpperCase();
  if (id.length <= 5) return 'CC';
  if (id.startsWith('PRDCC_')) return 'PRDCC';
  if (id.startsWith('PRD_')) return 'PRD';
  if (id.startsWith('FAM_')) return 'PRD_FAMILY';
  return null;
}

/**
 * Hash directory of a chemical component: the first character, or the last
 * two for extended (four- and five-character) ids. `ATP` → `A`, `AAPTR` → `TR`.
 */
export function getCcdHash(idCode: string | null | undefined): string | null {
  if (!idCode) return null;
  const id = idCode.toUpperCase();
  return id.length > 3 ? id.slice(-2) : id.slice(0, 1);
}

/**
 * Locations of chemical reference definition files (components, PRDs, PRD
 * components and PRD families) inside their checked-out repositories:
 *
 *   CC:     {root(CC)}/{hash}/{ID}/{ID}.cif
 *   others: {root(type)}/{last char of ID}/{ID}.cif
 *
 * where root(type) is `{sandboxRoot}/{projectName}`. Paths need a configured
 * sandbox; project info does not.
 */
@singleton()
export class ChemRefPathInfo {
  private readonly refData: RefDataConfig;
  private readonly logger: Logger;

  constructor(
    @inject(DI.Config.Site) config: ValidatedSiteConfig,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.refData = config.refData;
    this.logger = loggerFactory.create('ChemRefPathInfo');
  }

  getIdType(idCode: string | null | undefined): ChemRefIdType | null {
    return getIdType(idCode);
  }

  getCcdHash(idCode: string | null | undefined): string | null {
    return getCcdHash(idCode);
  }

  /** `{sandboxRoot}/{projectName}` for the id's type (or the one given). */
  getProjectPath(idCode?: string | null, idType?: ChemRefIdType | null): string | null {
    const type = idType ?? getIdType(idCode);
    if (type === null) return null;
    if (this.refData.sandboxRoot === null) {
      this.logger.debug({ idCode, idType: type }, 'No reference data sandbox configured');
      return null;
    }
    return path.join(this.refData.sandboxRoot, this.refData.projectNames[type]);
  }

  getFilePath(idCode: string, idType?: ChemRefIdType | null): string | null {
    const type = idType ?? getIdType(idCode);
    if (type === null) {
      this.logger.debug({ idCode }, 'Unrecognized reference data id');
      return null;
    }
    const root = this.getProjectPath(idCode, type);
    if (root === null) return null;
    return path.join(root, this.relativePath(idCode.toUpperCase(), type));
  }

  getFileDir(idCode: string, idType?: ChemRefIdType | null): string | null {
    const filePath = this.getFilePath(idCode, idType);
    return filePath === null ? null : path.dirname(filePath);
  }

  /** Project name and in-project path; the id keeps its case here. */
  getProjectInfo(idCode: string, idType?: ChemRefIdType | null): ChemRefProjectInfo | null {
    const type = idType ?? getIdType(idCode);
    if (type === null || idCode === '') return null;
    return { projectName: this.refData.projectNames[type], relativePath: this.relativePath(idCode, type) };
  }

  /** `/repo/A/ATP/ATP.cif` → `ATP`; paths of seven characters or fewer give null. */
  assignIdCodeFromFileName(filePath: string | null | undefined): string | null {
    if (!filePath || filePath.length <= 7) return null;
    const fileName = path.basename(filePath);
    return path.basename(fileName, path.extname(fileName)).toUpperCase();
  }

  private relativePath(id: string, type: ChemRefIdType): string {
    const fileName = `${id}.cif`;
    switch (type) {
      case 'CC':
        return path.join(getCcdHash(id) ?? '', id, fileName);
      case 'PRDCC':
      case 'PRD':
      case 'PRD_FAMILY':
        return path.join(id.slice(-1), fileName);
      default:
        return assertNever(type);
    }
  }
}
