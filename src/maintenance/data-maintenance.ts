import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import type { DirectoryListingPort } from '../ports/directory-listing.port.js';
import { PathInfoFactory } from '../locator/path-info.js';
import type { FileQuery, PathInfo } from '../locator/path-info.js';
import { VersionSelector } from '../locator/version-selector.js';
import type { VersionedFile } from '../locator/version-selector.js';
import { matchesSearchPattern } from '../locator/search-pattern.js';

/**
 * `exp`: keep the latest and compress the two oldest (experimental data and models).
 * `other`: keep the latest and compress only the oldest.
 * Everything in between is a removal candidate.
 */
export type PurgeStrategy = 'exp' | 'other';

export interface PurgeCandidates {
  readonly latest: string | null;
  readonly remove: readonly string[];
  readonly compress: readonly string[];
}

export interface LogFileEntry {
  readonly filePath: string;
  /** UTC, `YYYY-Mon-DD HH:MM:SS` */
  readonly modified: string;
  readonly sizeKb: number;
  readonly mtimeMs: number;
}

export type VersionListQuery = Omit<FileQuery, 'version'>;

export interface ContentTypeListQuery {
  readonly dataSetId: string;
  readonly storageClass?: string;
  readonly workflowInstanceId?: string | null;
  readonly contentTypes?: readonly string[];
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

export function formatTimestamp(ms: number): string {
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, '0');
  const month = MONTHS[d.getUTCMonth()] ?? '???';
  return (
    `${d.getUTCFullYear()}-${month}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/**
 * Read-only inventory of versioned files for post-release housekeeping.
 * Reports what a purge would touch; never deletes or compresses anything.
 */
@singleton()
export class DataMaintenance {
  private readonly logger: Logger;
  private sessionPath = '.';

  constructor(
    @inject(DI.Locator.PathInfoFactory) private readonly pathInfoFactory: PathInfoFactory,
    @inject(DI.Locator.VersionSelector) private readonly versionSelector: VersionSelector,
    @inject(DI.Infra.DirectoryListing) private readonly listing: DirectoryListingPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('DataMaintenance');
  }

  setSessionPath(sessionPath: string): void {
    this.sessionPath = sessionPath;
  }

  /** All versions of one content object, newest first. */
  getVersionFileList(query: VersionListQuery): readonly VersionedFile[] {
    const template = this.pathInfo().getFilePathVersionTemplate({ contentType: 'model', formatType: 'pdbx', ...query });
    return template === null ? [] : this.listTemplate(template);
  }

  getPurgeCandidates(query: VersionListQuery, strategy: PurgeStrategy = 'exp'): PurgeCandidates {
    const files = this.getVersionFileList(query).map((f) => f.filePath);
    const n = files.length;
    const latest = files[0] ?? null;
    if (n < 2) return { latest, remove: [], compress: [] };

    const keepOldest = strategy === 'exp' ? Math.min(2, n - 1) : 1;
    return {
      latest,
      remove: files.slice(1, n - keepOldest),
      compress: files.slice(n - keepOldest),
    };
  }

  /** Every version of every format of the given content types, newest version first. */
  getContentTypeFileList(query: ContentTypeListQuery): readonly VersionedFile[] {
    const pathInfo = this.pathInfo();
    const files: VersionedFile[] = [];
    for (const contentType of query.contentTypes ?? ['model']) {
      const template = pathInfo.getFilePathContentTypeTemplate({
        dataSetId: query.dataSetId,
        storageClass: query.storageClass,
        workflowInstanceId: query.workflowInstanceId,
        contentType,
      });
      if (template !== null) files.push(...this.listTemplate(template));
    }
    return files.sort((a, b) => b.version - a.version);
  }

  /** Log files of an archive or deposit directory (`*log` and `log/*`), most recently modified first. */
  getLogFileList(dataSetId: string, storageClass: 'archive' | 'wf-archive' | 'deposit' = 'archive'): readonly LogFileEntry[] {
    const pathInfo = this.pathInfo();
    const dirPath = storageClass === 'deposit' ? pathInfo.getDepositPath(dataSetId) : pathInfo.getArchivePath(dataSetId);
    if (dirPath === null) return [];

    const entries = [...this.listFiles(dirPath, '*log'), ...this.listFiles(path.join(dirPath, 'log'), '*')];
    return entries.sort((a, b) => b.mtimeMs - a.mtimeMs);
  }

  private listTemplate(template: string): readonly VersionedFile[] {
    const result = this.versionSelector.listVersionFiles(path.dirname(template), path.basename(template));
    if (result.isErr()) {
      this.logger.debug({ template, reason: result.error.message }, 'Version listing failed');
      return [];
    }
    return result.value;
  }

  private listFiles(dirPath: string, pattern: string): LogFileEntry[] {
    const result = this.listing.readdirWithStats(dirPath);
    if (result.isErr()) {
      this.logger.debug({ dirPath, reason: result.error.message }, 'Directory listing failed');
      return [];
    }
    return result.value
      .filter((e) => e.isFile && matchesSearchPattern(e.name, pattern))
      .map((e) => ({
        filePath: path.join(dirPath, e.name),
        modified: formatTimestamp(e.mtimeMs),
        sizeKb: e.sizeBytes / 1000,
        mtimeMs: e.mtimeMs,
      }));
  }

  private pathInfo(): PathInfo {
    return this.pathInfoFactory.create(this.sessionPath);
  }
}
