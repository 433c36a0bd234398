import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import { isSessionClass, parseStorageClass } from '../types/storage-class.js';
import { ANY_FORMAT } from './content-type-catalog.js';
import type { ContentTypeCatalog } from './content-type-catalog.js';
import { StorageLocationResolver } from './storage-location-resolver.js';
import { VersionSelector } from './version-selector.js';
import { DataFileReference } from './data-file-reference.js';
import type { LocatorDeps } from './data-file-reference.js';
import * as grammar from './filename-grammar.js';

export interface FileQuery {
  readonly dataSetId: string;
  readonly contentType?: string | null;
  readonly formatType?: string | null;
  /** Storage class; defaults to `archive`. */
  readonly storageClass?: string;
  /** Positive integer, `latest` (default), `next`, `previous` or `none`. */
  readonly version?: string | number;
  /** Positive integer (default 1) or `next`. */
  readonly partition?: string | number;
  readonly milestone?: string | null;
  readonly workflowInstanceId?: string | null;
}

/** Options shared by the named convenience getters. */
export type StandardFileOptions = Omit<FileQuery, 'contentType' | 'formatType' | 'partition'>;

/** Decomposed managed filename in symbolic terms; fields are null where unknown. */
export interface FileNameInfo {
  readonly dataSetId: string | null;
  readonly contentType: string | null;
  readonly formatType: string | null;
  readonly partition: number | null;
  readonly version: number | null;
}

const EMPTY_INFO: FileNameInfo = { dataSetId: null, contentType: null, formatType: null, partition: null, version: null };

/**
 * Path lookups for data files in archive, deposit, workflow-instance and
 * session storage. Every getter returns `null` when the inputs cannot be
 * resolved; only an unknown storage class throws.
 */
export class PathInfo {
  private sessionPath: string;

  constructor(
    private readonly deps: LocatorDeps,
    sessionPath = '.'
  ) {
    this.sessionPath = sessionPath;
  }

  setSessionPath(sessionPath: string): void {
    this.sessionPath = sessionPath;
  }

  getSessionPath(): string {
    return this.sessionPath;
  }

  // ---------------------------------------------------------------------------
  // Filenames
  // ---------------------------------------------------------------------------

  parseFileName(fileName: string): FileNameInfo {
    const parsed = grammar.parseFileName(fileName, { requireVersion: false });
    if (parsed === null) return EMPTY_INFO;
    const contentType = this.deps.catalog.contentTypeForToken(parsed.contentTypeToken);
    return {
      dataSetId: parsed.dataSetId,
      contentType,
      formatType: this.deps.catalog.formatForExtension(parsed.extension, contentType),
      partition: parsed.partition,
      version: parsed.version,
    };
  }

  isValidFileName(fileName: string, requireVersion = true): boolean {
    const info = this.parseFileName(fileName);
    if (info.dataSetId === null || info.contentType === null || info.formatType === null || info.partition === null) {
      return false;
    }
    return !requireVersion || info.version !== null;
  }

  splitFileName(fileName: string): FileNameInfo {
    const split = grammar.splitFileName(fileName);
    const contentType = split.contentTypeToken === null ? null : this.deps.catalog.contentTypeForToken(split.contentTypeToken);
    return {
      dataSetId: split.dataSetId,
      contentType,
      formatType: split.extension === null ? null : this.deps.catalog.formatForExtension(split.extension, contentType),
      partition: split.partition,
      version: split.version,
    };
  }

  getFileExtension(formatType: string): string | null {
    return this.deps.catalog.extensionFor(formatType);
  }

  // ---------------------------------------------------------------------------
  // Directories
  // ---------------------------------------------------------------------------

  getDirPath(query: Pick<FileQuery, 'dataSetId' | 'storageClass' | 'workflowInstanceId'>): string | null {
    return this.reference({ ...query, storageClass: query.storageClass ?? 'archive' }).getDirPathReference();
  }

  /** `G_` group ids live under autogroup, everything else under archive. */
  getArchivePath(dataSetId: string): string | null {
    return this.getDirPath({ dataSetId, storageClass: dataSetId.startsWith('G_') ? 'autogroup' : 'archive' });
  }

  getDepositPath(dataSetId: string): string | null {
    return this.getDirPath({ dataSetId, storageClass: 'deposit' });
  }

  getTempDepPath(dataSetId: string): string | null {
    return this.getDirPath({ dataSetId, storageClass: 'tempdep' });
  }

  getInstancePath(dataSetId: string, workflowInstanceId: string): string | null {
    return this.getDirPath({ dataSetId, storageClass: 'wf-instance', workflowInstanceId });
  }

  /** Parent of all workflow instance directories of a dataset. */
  getInstanceTopPath(dataSetId: string): string | null {
    const instance = this.getInstancePath(dataSetId, 'W_001');
    return instance === null ? null : path.dirname(instance);
  }

  // ---------------------------------------------------------------------------
  // Files
  // ---------------------------------------------------------------------------

  getFilePath(query: FileQuery): string | null {
    return this.reference(query).getFilePathReference();
  }

  getFileName(query: FileQuery): string | null {
    return this.reference(query).getFileName();
  }

  /** Web path of a file in the session download area: `/sessions/{sessionId}/downloads/{file}`. */
  getWebDownloadPath(query: Omit<FileQuery, 'storageClass'>): string | null {
    const fileName = this.getFileName({ ...query, storageClass: 'session-download' });
    if (fileName === null) return null;
    return path.posix.join('/sessions', path.basename(this.sessionPath), 'downloads', fileName);
  }

  // ---------------------------------------------------------------------------
  // Search templates (full paths with `*` wildcards)
  // ---------------------------------------------------------------------------

  getFilePathVersionTemplate(query: Omit<FileQuery, 'version'>): string | null {
    const ref = this.reference({ ...query, version: 'none' });
    return ref.isReferenceValid() ? this.joinDir(ref, ref.getVersionIdSearchTarget()) : null;
  }

  getFilePathPartitionTemplate(query: Omit<FileQuery, 'version' | 'partition'>): string | null {
    const ref = this.reference({ ...query, version: 'none', partition: 1 });
    return ref.isReferenceValid() ? this.joinDir(ref, ref.getPartitionNumberSearchTarget()) : null;
  }

  getFilePathContentTypeTemplate(query: Omit<FileQuery, 'version' | 'partition' | 'formatType'>): string | null {
    const ref = this.reference({ ...query, formatType: ANY_FORMAT, version: 'none', partition: 1 });
    return this.joinDir(ref, ref.getContentTypeSearchTarget());
  }

  // ---------------------------------------------------------------------------
  // Named content types
  // ---------------------------------------------------------------------------

  getModelPdbxFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'model', 'pdbx');
  }

  getModelPdbFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'model', 'pdb');
  }

  getStructureFactorsPdbxFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'structure-factors', 'pdbx');
  }

  getPolyLinkFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'polymer-linkage-distances', 'pdbx');
  }

  getPolyLinkReportFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'polymer-linkage-report', 'html');
  }

  getSequenceStatsFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'seq-data-stats', 'pic');
  }

  getSequenceAlignFilePath(options: StandardFileOptions & { readonly entityId?: string | number }): string | null {
    return this.standard(options, 'seq-align-data', 'pic', options.entityId ?? 1);
  }

  getReferenceSequenceFilePath(options: StandardFileOptions & { readonly entityId?: string | number }): string | null {
    return this.standard(options, 'seqdb-match', 'pdbx', options.entityId ?? 1);
  }

  getSequenceAssignmentFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'seq-assign', 'pdbx');
  }

  getAssemblyAssignmentFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'assembly-assign', 'pdbx');
  }

  getAssemblyModelFilePath(options: StandardFileOptions): string | null {
    return this.standard({ storageClass: 'deposit', ...options }, 'assembly-model', 'pdbx');
  }

  getAssemblySuggestedFilePath(options: StandardFileOptions): string | null {
    return this.standard({ storageClass: 'deposit', ...options }, 'assembly-suggested', 'json');
  }

  getBlastMatchFilePath(options: StandardFileOptions & { readonly entityId?: string | number }): string | null {
    return this.standard(options, 'blast-match', 'xml', options.entityId ?? 1);
  }

  getMap2fofcFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'map-2fofc', 'map');
  }

  getMapfofcFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'map-fofc', 'map');
  }

  getOmitMap2fofcFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'omit-map-2fofc', 'map');
  }

  getOmitMapfofcFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'omit-map-fofc', 'map');
  }

  getEmVolumeFilePath(options: StandardFileOptions): string | null {
    return this.standard(options, 'em-volume', 'map');
  }

  getEmMaskFilePath(options: StandardFileOptions & { readonly maskNumber?: string | number }): string | null {
    return this.standard(options, 'em-mask', 'map', options.maskNumber ?? 1);
  }

  getEmDepositVolumeParamsFilePath(options: StandardFileOptions & { readonly maskNumber?: string | number }): string | null {
    return this.standard({ storageClass: 'deposit', ...options }, 'deposit-volume-params', 'pic', options.maskNumber ?? 1);
  }

  /**
   * Author chemical shift files are appended, so the partition defaults to `next`.
   * A new partition holds no files yet; its version then defaults to `next` (1).
   */
  getAuthChemicalShiftsFilePath(
    options: StandardFileOptions & { readonly formatType?: string; readonly partition?: string | number }
  ): string | null {
    const partition = options.partition ?? 'next';
    const version = options.version ?? (partition === 'next' ? 'next' : 'latest');
    return this.standard({ ...options, version }, 'nmr-chemical-shifts-auth', options.formatType ?? 'nmr-star', partition);
  }

  getChemicalShiftsFilePath(options: StandardFileOptions & { readonly formatType?: string }): string | null {
    return this.standard(options, 'nmr-chemical-shifts', options.formatType ?? 'nmr-star');
  }

  getMolecularRestraintsFilePath(options: StandardFileOptions & { readonly formatType?: string }): string | null {
    return this.standard(options, 'nmr-restraints', options.formatType ?? 'nmr-star');
  }

  getNmrCombinedFilePath(options: StandardFileOptions & { readonly formatType?: string }): string | null {
    return this.standard(options, 'nmr-data-str', options.formatType ?? 'nmr-star');
  }

  getNmrifFilePath(options: StandardFileOptions): string | null {
    return this.standard({ storageClass: 'deposit', ...options }, 'nmrif', 'pdbx');
  }

  getStatusHistoryFilePath(options: Omit<StandardFileOptions, 'milestone' | 'workflowInstanceId'>): string | null {
    return this.standard(options, 'status-history', 'pdbx');
  }

  // ---------------------------------------------------------------------------

  private standard(
    options: StandardFileOptions,
    contentType: string,
    formatType: string,
    partition: string | number = 1
  ): string | null {
    return this.getFilePath({ ...options, contentType, formatType, partition });
  }

  private joinDir(ref: DataFileReference, target: string | null): string | null {
    const dirPath = ref.getDirPathReference();
    return dirPath === null || target === null ? null : path.join(dirPath, target);
  }

  /** @throws InvalidStorageClassError */
  private reference(query: FileQuery): DataFileReference {
    const storageClass = parseStorageClass(query.storageClass ?? 'archive');
    const ref = new DataFileReference(this.deps)
      .setDataSetId(query.dataSetId)
      .setStorageType(storageClass)
      .setMilestone(query.milestone ?? null)
      .setPartitionNumber(query.partition ?? 1)
      .setVersionId(query.version ?? 'latest')
      .setWorkflowInstanceId(query.workflowInstanceId ?? null);

    if (query.contentType !== undefined && query.contentType !== null) {
      ref.setContentTypeAndFormat(query.contentType, query.formatType ?? ANY_FORMAT);
    }

    if (isSessionClass(storageClass)) ref.setSessionPath(this.sessionPath);
    return ref;
  }
}

/** Builds {@link PathInfo} instances that share the container's collaborators. */
@singleton()
export class PathInfoFactory {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Locator.Catalog) private readonly catalog: ContentTypeCatalog,
    @inject(DI.Locator.StorageResolver) private readonly resolver: StorageLocationResolver,
    @inject(DI.Locator.VersionSelector) private readonly versionSelector: VersionSelector,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('PathInfo');
  }

  create(sessionPath = '.'): PathInfo {
    return new PathInfo(
      { catalog: this.catalog, resolver: this.resolver, versionSelector: this.versionSelector, logger: this.logger },
      sessionPath
    );
  }
}
