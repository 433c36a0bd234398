import * as path from 'path';
import type { Logger } from '../core/logging/index.js';
import { asDataSetId } from '../types/data-set-id.js';
import type { DataSetId } from '../types/data-set-id.js';
import { parseStorageClass } from '../types/storage-class.js';
import type { StorageClass } from '../types/storage-class.js';
import { parsePartitionRequest, parseVersionRequest } from '../types/version-request.js';
import type { PartitionRequest, VersionRequest } from '../types/version-request.js';
import { ANY_FORMAT } from './content-type-catalog.js';
import type { ContentTypeCatalog } from './content-type-catalog.js';
import type { StorageLocationResolver } from './storage-location-resolver.js';
import type { VersionSelector } from './version-selector.js';
import { renderFileName } from './filename-grammar.js';
import { assertNever } from '../runtime/assert-never.js';

export interface LocatorDeps {
  readonly catalog: ContentTypeCatalog;
  readonly resolver: StorageLocationResolver;
  readonly versionSelector: VersionSelector;
  readonly logger: Logger;
}

// A setter received a value it could not parse; the reference stays invalid.
const INVALID = Symbol('invalid');
type Invalid = typeof INVALID;

interface NameParts {
  readonly dataSetId: DataSetId;
  readonly token: string;
  readonly extension: string;
}

/**
 * Builder describing one managed file: set the keys, then read paths.
 *
 * Defaults: storage class `archive`, partition 1, version `latest`.
 * Nothing here touches the filesystem except symbolic version and `next`
 * partition resolution, which list the target directory.
 */
export class DataFileReference {
  private dataSetId: DataSetId | null | Invalid = null;
  private storageClass: StorageClass = 'archive';
  private contentType: string | null = null;
  private formatType: string | null = null;
  private milestone: string | null = null;
  private partition: PartitionRequest | Invalid = { kind: 'exact', partition: 1 };
  private version: VersionRequest | Invalid = { kind: 'latest' };
  private workflowInstanceId: string | null = null;
  private sessionPath: string | null = null;

  constructor(private readonly deps: LocatorDeps) {}

  setDataSetId(value: string): this {
    this.dataSetId = asDataSetId(value.trim()) ?? INVALID;
    return this;
  }

  /** @throws InvalidStorageClassError */
  setStorageType(value: string): this {
    this.storageClass = parseStorageClass(value);
    return this;
  }

  /**
   * `contentType` may be a base type (`model`) or an effective type carrying
   * a milestone (`model-upload`).
   */
  setContentTypeAndFormat(contentType: string, formatType: string): this {
    this.contentType = contentType;
    this.formatType = formatType;
    return this;
  }

  setMilestone(milestone: string | null): this {
    this.milestone = milestone === '' ? null : milestone;
    return this;
  }

  setPartitionNumber(value: string | number): this {
    this.partition = parsePartitionRequest(value) ?? INVALID;
    return this;
  }

  setVersionId(value: string | number): this {
    this.version = parseVersionRequest(value) ?? INVALID;
    return this;
  }

  setWorkflowInstanceId(value: string | null): this {
    this.workflowInstanceId = value;
    return this;
  }

  setSessionPath(value: string | null): this {
    this.sessionPath = value;
    return this;
  }

  isReferenceValid(): boolean {
    if (this.partition === INVALID || this.version === INVALID) return false;
    if (this.formatType === null || !this.isFormatKnown(this.formatType)) return false;
    if (this.nameParts(this.formatType) === null) return false;
    const resolved = this.contentType === null ? null : this.deps.catalog.resolveContentType(this.contentType);
    if (resolved === null || !this.deps.catalog.isFormatAllowed(resolved.base, this.formatType)) return false;
    return this.getDirPathReference() !== null;
  }

  getDirPathReference(): string | null {
    const dataSetId = this.dataSetId === INVALID ? null : this.dataSetId;
    const result = this.deps.resolver.resolve(this.storageClass, {
      dataSetId,
      workflowInstanceId: this.workflowInstanceId,
      sessionRoot: this.sessionPath,
    });
    if (result.isErr()) {
      this.deps.logger.debug({ storageClass: this.storageClass, reason: result.error.message }, 'Directory not resolved');
      return null;
    }
    return result.value;
  }

  /**
   * Full path of the concrete file; symbolic versions and a `next` partition
   * are resolved against the directory. Version `none` gives the path without
   * a `.V` suffix. `null` when the reference is invalid or nothing matches.
   */
  getFilePathReference(): string | null {
    if (!this.isReferenceValid() || this.formatType === ANY_FORMAT) {
      this.deps.logger.debug(this.describe(), 'Invalid file reference');
      return null;
    }
    const dirPath = this.getDirPathReference();
    const parts = this.formatType === null ? null : this.nameParts(this.formatType);
    if (dirPath === null || parts === null || this.partition === INVALID || this.version === INVALID) return null;

    const partition = this.resolvePartition(dirPath, parts, this.partition);
    if (partition === null) return null;

    const version = this.resolveVersion(dirPath, parts, partition, this.version);
    if (version === undefined) return null;

    return path.join(dirPath, renderFileName({ ...this.fieldsOf(parts), partition, version }));
  }

  getFileName(): string | null {
    const filePath = this.getFilePathReference();
    return filePath === null ? null : path.basename(filePath);
  }

  /** `{id}_{token}_P{n}.{ext}.V*` */
  getVersionIdSearchTarget(): string | null {
    const parts = this.formatType === null ? null : this.nameParts(this.formatType);
    if (parts === null || this.partition === INVALID || this.partition.kind !== 'exact') {
      return null;
    }
    return renderFileName({ ...this.fieldsOf(parts), partition: this.partition.partition, version: '*' });
  }

  /** `{id}_{token}_P*.{ext}.V*` */
  getPartitionNumberSearchTarget(): string | null {
    const parts = this.formatType === null ? null : this.nameParts(this.formatType);
    return parts === null ? null : renderFileName({ ...this.fieldsOf(parts), partition: '*', version: '*' });
  }

  /**
   * `{id}_{token}_P*.{ext}.V*`, with `*` for the token when no content type is
   * set and for the extension when the format is `any` or unset.
   */
  getContentTypeSearchTarget(): string | null {
    if (this.dataSetId === null || this.dataSetId === INVALID) return null;

    let token = '*';
    if (this.contentType !== null) {
      const resolved = this.tokenForCurrentContentType();
      if (resolved === null) return null;
      token = resolved;
    }

    let extension = '*';
    if (this.formatType !== null && this.formatType !== ANY_FORMAT) {
      const ext = this.deps.catalog.extensionFor(this.formatType);
      if (ext === null) return null;
      extension = ext;
    }

    return renderFileName({ dataSetId: this.dataSetId, contentTypeToken: token, extension, partition: '*', version: '*' });
  }

  private resolvePartition(dirPath: string, parts: NameParts, request: PartitionRequest): number | null {
    if (request.kind === 'exact') return request.partition;
    const next = this.deps.versionSelector.nextPartition(
      dirPath,
      renderFileName({ ...this.fieldsOf(parts), partition: '*', version: '*' })
    );
    return next.isOk() ? next.value : null;
  }

  /** Concrete version, `null` for no suffix, `undefined` when unresolved. */
  private resolveVersion(
    dirPath: string,
    parts: NameParts,
    partition: number,
    request: VersionRequest
  ): number | null | undefined {
    switch (request.kind) {
      case 'exact':
        return request.version;
      case 'none':
        return null;
      case 'latest':
      case 'next':
      case 'previous': {
        const pattern = renderFileName({ ...this.fieldsOf(parts), partition, version: '*' });
        const resolved = this.deps.versionSelector.resolve(dirPath, pattern, request.kind);
        return resolved.isOk() ? resolved.value : undefined;
      }
      default:
        return assertNever(request);
    }
  }

  private nameParts(formatType: string): NameParts | null {
    if (this.dataSetId === null || this.dataSetId === INVALID) return null;
    const token = this.tokenForCurrentContentType();
    const extension = formatType === ANY_FORMAT ? '*' : this.deps.catalog.extensionFor(formatType);
    if (token === null || extension === null) return null;
    return { dataSetId: this.dataSetId, token, extension };
  }

  private tokenForCurrentContentType(): string | null {
    if (this.contentType === null) return null;
    const resolved = this.deps.catalog.resolveContentType(this.contentType);
    if (resolved === null) return null;
    const milestone = resolved.milestone ?? this.milestone;
    return this.deps.catalog.tokenFor(resolved.base, milestone);
  }

  private isFormatKnown(formatType: string): boolean {
    return formatType === ANY_FORMAT || this.deps.catalog.extensionFor(formatType) !== null;
  }

  private fieldsOf(parts: NameParts): { dataSetId: string; contentTypeToken: string; extension: string } {
    return { dataSetId: parts.dataSetId, contentTypeToken: parts.token, extension: parts.extension };
  }

  private describe(): Record<string, unknown> {
    return {
      dataSetId: this.dataSetId === INVALID ? '(invalid)' : this.dataSetId,
      storageClass: this.storageClass,
      contentType: this.contentType,
      formatType: this.formatType,
      milestone: this.milestone,
    };
  }
}
