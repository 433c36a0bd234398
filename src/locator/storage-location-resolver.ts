import * as path from 'path';
import { inject, singleton } from 'tsyringe';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { DI } from '../di/tokens.js';
import type { ValidatedSiteConfig } from '../config/site-config.js';
import type { DataSetId } from '../types/data-set-id.js';
import { isGroupId } from '../types/data-set-id.js';
import type { StorageClass } from '../types/storage-class.js';

export interface StorageKeys {
  readonly dataSetId?: DataSetId | null;
  readonly workflowInstanceId?: string | null;
  readonly sessionRoot?: string | null;
}

export type MissingStorageKey = 'dataSetId' | 'workflowInstanceId' | 'sessionRoot';

export type StorageResolutionError = {
  readonly code: 'STORAGE_KEY_MISSING';
  readonly storageClass: StorageClass;
  readonly key: MissingStorageKey;
  readonly message: string;
};

type Roots = {
  readonly archiveRoot: string;
  readonly uiRoot: string | null;
};

type Rule = (roots: Roots, keys: StorageKeys, storageClass: StorageClass) => Result<string, StorageResolutionError>;

function missing(storageClass: StorageClass, key: MissingStorageKey): StorageResolutionError {
  return {
    code: 'STORAGE_KEY_MISSING',
    storageClass,
    key,
    message: `Storage class '${storageClass}' requires ${key}`,
  };
}

function withId(build: (roots: Roots, id: DataSetId) => string): Rule {
  return (roots, keys, storageClass) =>
    keys.dataSetId ? ok(build(roots, keys.dataSetId)) : err(missing(storageClass, 'dataSetId'));
}

function withSession(build: (sessionRoot: string) => string): Rule {
  return (_roots, keys, storageClass) =>
    keys.sessionRoot ? ok(build(keys.sessionRoot)) : err(missing(storageClass, 'sessionRoot'));
}

const archiveDir = withId(({ archiveRoot }, id) =>
  path.join(archiveRoot, isGroupId(id) ? 'autogroup' : 'archive', id)
);

const depositDir = withId(({ archiveRoot }, id) => path.join(archiveRoot, 'deposit', id));

const sessionDir = withSession((sessionRoot) => sessionRoot);

const RULES: Readonly<Record<StorageClass, Rule>> = {
  archive: archiveDir,
  'wf-archive': archiveDir,
  autogroup: withId(({ archiveRoot }, id) => path.join(archiveRoot, 'autogroup', id)),
  deposit: depositDir,
  'deposit-ui': withId(({ archiveRoot, uiRoot }, id) => path.join(uiRoot ?? archiveRoot, 'deposit', id)),
  tempdep: withId(({ archiveRoot, uiRoot }, id) => path.join(uiRoot ?? archiveRoot, 'tempdep', id)),
  uploads: withId(({ archiveRoot, uiRoot }, id) =>
    uiRoot !== null
      ? path.join(uiRoot, 'deposit-ui', 'uploads', id)
      : path.join(archiveRoot, 'deposit', 'temp_files', 'deposition_uploads', id)
  ),
  'wf-instance': (roots, keys, storageClass) => {
    if (!keys.dataSetId) return err(missing(storageClass, 'dataSetId'));
    if (!keys.workflowInstanceId) return err(missing(storageClass, 'workflowInstanceId'));
    return ok(path.join(roots.archiveRoot, 'workflow', keys.dataSetId, 'instance', keys.workflowInstanceId));
  },
  session: sessionDir,
  'wf-session': sessionDir,
  'session-download': withSession((sessionRoot) => path.join(sessionRoot, 'downloads')),
  pickles: withId(({ archiveRoot }, id) => path.join(archiveRoot, 'deposit', 'temp_files', 'deposition-pickles', id)),
};

/**
 * Maps a storage class and its keys to a base directory. Never guesses:
 * a missing key is an error, not a default.
 */
@singleton()
export class StorageLocationResolver {
  private readonly roots: Roots;

  constructor(@inject(DI.Config.Site) config: ValidatedSiteConfig) {
    this.roots = { archiveRoot: config.archiveRoot, uiRoot: config.uiRoot };
  }

  resolve(storageClass: StorageClass, keys: StorageKeys): Result<string, StorageResolutionError> {
    return RULES[storageClass](this.roots, keys, storageClass);
  }
}
