import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import { createValidatedSiteConfig } from '../config/site-config.js';
import type { ValidatedSiteConfig } from '../config/site-config.js';
import { ReleaseFileNames } from './release-file-names.js';

const PDB_CONTENT_DIRS = {
  model: 'mmCIF',
  'structure-factors': 'structure_factors',
  'chemical-shifts': 'nmr_chemical_shifts',
  'nmr-data': 'nmr_data',
} as const;

export type PdbFtpContent = keyof typeof PDB_CONTENT_DIRS;

export interface FtpRootOverrides {
  readonly pdbRoot?: string | null;
  readonly emdbRoot?: string | null;
}

/**
 * Locations inside a local mirror of the public FTP archive. Every getter
 * returns null when the corresponding mirror root is not configured.
 *
 * Shared through the container, so roots are fixed at construction; use
 * {@link withRoots} for a caller-local mirror.
 */
@singleton()
export class LocalFtpPathInfo {
  private readonly pdbRoot: string | null;
  private readonly emdbRoot: string | null;

  constructor(
    @inject(DI.Config.Site) private readonly config: ValidatedSiteConfig,
    @inject(DI.Release.FileNames) private readonly names: ReleaseFileNames
  ) {
    this.pdbRoot = config.pdbFtpRoot;
    this.emdbRoot = config.emdbFtpRoot;
  }

  /** New instance over other mirror roots; empty or missing overrides keep the configured root. */
  withRoots(overrides: FtpRootOverrides): LocalFtpPathInfo {
    const config = createValidatedSiteConfig({
      archiveRoot: this.config.archiveRoot,
      uiRoot: this.config.uiRoot,
      pdbFtpRoot: overrides.pdbRoot || this.config.pdbFtpRoot,
      emdbFtpRoot: overrides.emdbRoot || this.config.emdbFtpRoot,
      refData: this.config.refData,
      catalog: this.config.catalog,
    });
    return new LocalFtpPathInfo(config, this.names);
  }

  /** `{pdbRoot}/pdb/data/structures/all` */
  getFtpPdb(): string | null {
    return this.pdbRoot === null ? null : path.join(this.pdbRoot, 'pdb', 'data', 'structures', 'all');
  }

  /** `{emdbRoot}/emdb/structures` */
  getFtpEmdb(): string | null {
    return this.emdbRoot === null ? null : path.join(this.emdbRoot, 'emdb', 'structures');
  }

  getContentPath(content: PdbFtpContent): string | null {
    const base = this.getFtpPdb();
    return base === null ? null : path.join(base, PDB_CONTENT_DIRS[content]);
  }

  getModelPath(): string | null {
    return this.getContentPath('model');
  }

  getSfPath(): string | null {
    return this.getContentPath('structure-factors');
  }

  getCsPath(): string | null {
    return this.getContentPath('chemical-shifts');
  }

  getNmrDataPath(): string | null {
    return this.getContentPath('nmr-data');
  }

  getModelFilePath(accession: string): string | null {
    return this.join(this.getModelPath(), this.names.getModel(accession));
  }

  getStructureFactorsFilePath(accession: string): string | null {
    return this.join(this.getSfPath(), this.names.getStructureFactor(accession));
  }

  getChemicalShiftsFilePath(accession: string): string | null {
    return this.join(this.getCsPath(), this.names.getChemicalShifts(accession));
  }

  getNmrDataFilePath(accession: string): string | null {
    return this.join(this.getNmrDataPath(), this.names.getNmrData(accession));
  }

  private join(dir: string | null, fileName: string): string | null {
    return dir === null ? null : path.join(dir, fileName);
  }
}
