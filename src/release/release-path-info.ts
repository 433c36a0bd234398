import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { DI } from '../di/tokens.js';
import type { ValidatedSiteConfig } from '../config/site-config.js';
import { InvalidSubdirectoryError } from '../core/error-handler.js';

export const RELEASE_SUBDIRS = ['added', 'modified', 'obsolete', 'emd', 'val_reports', 'em-val-reports'] as const;
export const RELEASE_VERSIONS = ['current', 'previous'] as const;
export const EMD_SUB_PATHS = ['header', 'map', 'fsc', 'images', 'masks', 'other', 'validation'] as const;

export type ReleaseSubdir = (typeof RELEASE_SUBDIRS)[number];
export type ReleaseVersion = (typeof RELEASE_VERSIONS)[number];
export type EmdSubPath = (typeof EMD_SUB_PATHS)[number];

export interface ForReleaseQuery {
  readonly subdir?: string | null;
  readonly version?: string;
  readonly accession?: string | null;
  readonly emSubPath?: string | null;
}

function oneOf<T extends string>(
  kind: 'subdir' | 'version' | 'em-sub-path',
  value: string,
  allowed: readonly T[]
): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) throw new InvalidSubdirectoryError(kind, value, allowed);
  return match;
}

/**
 * Directories of the for-release staging area:
 *
 *   {archiveRoot}/for-release[/previous][/subdir][/accession[/emSubPath]]
 */
@singleton()
export class ReleasePathInfo {
  private readonly forReleaseRoot: string;

  constructor(@inject(DI.Config.Site) config: ValidatedSiteConfig) {
    this.forReleaseRoot = path.join(config.archiveRoot, 'for-release');
  }

  /** @throws InvalidSubdirectoryError for names outside the fixed sets */
  getForReleasePath(query: ForReleaseQuery = {}): string {
    const version = oneOf('version', query.version ?? 'current', RELEASE_VERSIONS);
    const segments: string[] = [this.forReleaseRoot];
    if (version === 'previous') segments.push('previous');

    const subdir = query.subdir ? oneOf('subdir', query.subdir, RELEASE_SUBDIRS) : null;
    if (subdir !== null) segments.push(subdir);

    if (query.emSubPath) {
      const emSubPath = oneOf('em-sub-path', query.emSubPath, EMD_SUB_PATHS);
      if (subdir !== 'emd' || !query.accession) {
        throw new InvalidSubdirectoryError('em-sub-path', emSubPath, ['(requires subdir emd and an accession)']);
      }
      segments.push(query.accession, emSubPath);
    } else if (query.accession) {
      segments.push(query.accession);
    }

    return path.join(...segments);
  }

  getAddedPath(previous = false): string {
    return this.getForReleasePath({ subdir: 'added', version: versionOf(previous) });
  }

  getModifiedPath(previous = false): string {
    return this.getForReleasePath({ subdir: 'modified', version: versionOf(previous) });
  }

  getObsoletePath(previous = false): string {
    return this.getForReleasePath({ subdir: 'obsolete', version: versionOf(previous) });
  }

  getEmdPath(previous = false): string {
    return this.getForReleasePath({ subdir: 'emd', version: versionOf(previous) });
  }

  getValReportsPath(previous = false): string {
    return this.getForReleasePath({ subdir: 'val_reports', version: versionOf(previous) });
  }

  getEmValReportsPath(previous = false): string {
    return this.getForReleasePath({ subdir: 'em-val-reports', version: versionOf(previous) });
  }

  /** e.g. `for-release/emd/EMD-1234/map` */
  getEmdSubfolderPath(accession: string, emSubPath: string, previous = false): string {
    return this.getForReleasePath({ subdir: 'emd', version: versionOf(previous), accession, emSubPath });
  }
}

function versionOf(previous: boolean): ReleaseVersion {
  return previous ? 'previous' : 'current';
}
