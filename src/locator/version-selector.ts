import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { DI } from '../di/tokens.js';
import type { DirectoryListingPort, FsError } from '../ports/directory-listing.port.js';
import type { ILoggerFactory, Logger } from '../core/logging/index.js';
import { assertNever } from '../runtime/assert-never.js';
import { matchesSearchPattern } from './search-pattern.js';
import { parseFileName, parseVersionSuffix } from './filename-grammar.js';

export type SymbolicVersionKind = 'latest' | 'next' | 'previous';

export type VersionUnavailable =
  | { readonly code: 'NO_VERSIONS'; readonly request: SymbolicVersionKind; readonly message: string }
  | { readonly code: 'NO_PREVIOUS_VERSION'; readonly present: readonly number[]; readonly message: string }
  | { readonly code: 'LISTING_FAILED'; readonly cause: FsError; readonly message: string };

export interface VersionedFile {
  readonly filePath: string;
  readonly fileName: string;
  readonly version: number;
}

/**
 * Pure selection over the distinct versions present.
 * latest → max; next → max + 1 (1 when empty); previous → second highest.
 */
export function selectVersion(versions: readonly number[], request: SymbolicVersionKind): Result<number, VersionUnavailable> {
  const distinct = [...new Set(versions)].sort((a, b) => b - a);
  const [highest, second] = distinct;

  switch (request) {
    case 'latest': {
      if (highest !== undefined) return ok(highest);
      const error: VersionUnavailable = { code: 'NO_VERSIONS', request, message: 'No versions present' };
      return err(error);
    }
    case 'next':
      return ok(highest === undefined ? 1 : highest + 1);
    case 'previous': {
      if (second !== undefined) return ok(second);
      const error: VersionUnavailable = {
        code: 'NO_PREVIOUS_VERSION',
        present: distinct,
        message: 'Fewer than two versions present',
      };
      return err(error);
    }
    default:
      return assertNever(request);
  }
}

/**
 * Resolves symbolic versions and partitions by listing the target directory.
 * Lists on every call; nothing is cached.
 */
@singleton()
export class VersionSelector {
  private readonly logger: Logger;

  constructor(
    @inject(DI.Infra.DirectoryListing) private readonly listing: DirectoryListingPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('VersionSelector');
  }

  /** Matching regular files that carry a version, newest first. */
  listVersionFiles(dirPath: string, pattern: string): Result<readonly VersionedFile[], VersionUnavailable> {
    return this.matching(dirPath, pattern).map((names) => {
      const files: VersionedFile[] = [];
      for (const fileName of names) {
        const version = parseVersionSuffix(fileName);
        if (version === null) continue;
        files.push({ filePath: path.join(dirPath, fileName), fileName, version });
      }
      return files.sort((a, b) => b.version - a.version || a.fileName.localeCompare(b.fileName));
    });
  }

  presentVersions(dirPath: string, pattern: string): Result<readonly number[], VersionUnavailable> {
    return this.listVersionFiles(dirPath, pattern).map((files) =>
      [...new Set(files.map((f) => f.version))].sort((a, b) => a - b)
    );
  }

  resolve(dirPath: string, pattern: string, request: SymbolicVersionKind): Result<number, VersionUnavailable> {
    const result = this.presentVersions(dirPath, pattern).andThen((versions) => selectVersion(versions, request));
    if (result.isErr()) {
      this.logger.debug({ dirPath, pattern, request, reason: result.error.code }, 'Version not resolved');
    }
    return result;
  }

  /** Highest partition present among matching names plus one; 1 when none. */
  nextPartition(dirPath: string, pattern: string): Result<number, VersionUnavailable> {
    return this.matching(dirPath, pattern).map((names) => {
      let highest = 0;
      for (const name of names) {
        const parsed = parseFileName(name, { requireVersion: false });
        if (parsed !== null && parsed.partition > highest) highest = parsed.partition;
      }
      return highest + 1;
    });
  }

  // Regular files only; a directory named like a version never counts.
  private matching(dirPath: string, pattern: string): Result<readonly string[], VersionUnavailable> {
    return this.listing
      .readdirWithStats(dirPath)
      .map((entries) => entries.filter((e) => e.isFile && matchesSearchPattern(e.name, pattern)).map((e) => e.name))
      .mapErr((cause): VersionUnavailable => ({ code: 'LISTING_FAILED', cause, message: cause.message }));
  }
}
