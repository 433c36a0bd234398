import { describe, it, expect } from 'vitest';
import { err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { VersionSelector, selectVersion } from '../../../src/locator/version-selector.js';
import type { DirectoryListingPort, DirEntryWithStats, FsError } from '../../../src/ports/directory-listing.port.js';
import { InMemoryDirectoryListing } from '../../fakes/directory-listing.fake.js';
import { CapturingLoggerFactory } from '../../helpers/test-logger.js';

describe('selectVersion', () => {
  it('picks the highest for latest', () => {
    expect(selectVersion([1, 3, 2], 'latest')._unsafeUnwrap()).toBe(3);
  });

  it('picks highest + 1 for next, 1 when empty', () => {
    expect(selectVersion([1, 2, 3], 'next')._unsafeUnwrap()).toBe(4);
    expect(selectVersion([], 'next')._unsafeUnwrap()).toBe(1);
  });

  it('picks the second highest for previous', () => {
    expect(selectVersion([1, 2], 'previous')._unsafeUnwrap()).toBe(1);
    expect(selectVersion([5, 2, 9], 'previous')._unsafeUnwrap()).toBe(5);
  });

  it('ignores duplicates', () => {
    expect(selectVersion([2, 2], 'previous')._unsafeUnwrapErr().code).toBe('NO_PREVIOUS_VERSION');
  });

  it('fails latest on an empty set and previous on a single version', () => {
    expect(selectVersion([], 'latest')._unsafeUnwrapErr().code).toBe('NO_VERSIONS');
    expect(selectVersion([1], 'previous')._unsafeUnwrapErr()).toEqual({
      code: 'NO_PREVIOUS_VERSION',
      present: [1],
      message: 'Fewer than two versions present',
    });
  });
});

describe('VersionSelector', () => {
  const DIR = '/data/archive/archive/D_000001';
  const PATTERN = 'D_000001_model_P1.cif.V*';

  function setup(names: readonly string[]) {
    const listing = new InMemoryDirectoryListing().addFiles(DIR, names);
    const logs = new CapturingLoggerFactory();
    return { selector: new VersionSelector(listing, logs), logs };
  }

  it('lists matching versioned files newest first', () => {
    const { selector } = setup([
      'D_000001_model_P1.cif.V1',
      'D_000001_model_P1.cif.V10',
      'D_000001_model_P1.cif.V2',
      'D_000001_model_P2.cif.V5',
      'D_000001_sf_P1.cif.V9',
    ]);
    const files = selector.listVersionFiles(DIR, PATTERN)._unsafeUnwrap();
    expect(files.map((f) => f.version)).toEqual([10, 2, 1]);
    expect(files[0]?.filePath).toBe(`${DIR}/D_000001_model_P1.cif.V10`);
  });

  it('ignores directories whose names look like versions', () => {
    const listing = new InMemoryDirectoryListing()
      .addFiles(DIR, ['D_000001_model_P1.cif.V1', 'D_000001_model_P1.cif.V2'])
      .addFile(`${DIR}/D_000001_model_P1.cif.V9/stray.txt`)
      .addFile(`${DIR}/D_000001_model_P4.cif.V1/stray.txt`);
    const selector = new VersionSelector(listing, new CapturingLoggerFactory());

    expect(selector.listVersionFiles(DIR, PATTERN)._unsafeUnwrap().map((f) => f.version)).toEqual([2, 1]);
    expect(selector.resolve(DIR, PATTERN, 'latest')._unsafeUnwrap()).toBe(2);
    expect(selector.nextPartition(DIR, 'D_000001_model_P*.cif.V*')._unsafeUnwrap()).toBe(2);
  });

  it('resolves symbolic requests from the listing', () => {
    const { selector } = setup(['D_000001_model_P1.cif.V1', 'D_000001_model_P1.cif.V2', 'D_000001_model_P1.cif.V3']);
    expect(selector.resolve(DIR, PATTERN, 'latest')._unsafeUnwrap()).toBe(3);
    expect(selector.resolve(DIR, PATTERN, 'next')._unsafeUnwrap()).toBe(4);
    expect(selector.resolve(DIR, PATTERN, 'previous')._unsafeUnwrap()).toBe(2);
    expect(selector.presentVersions(DIR, PATTERN)._unsafeUnwrap()).toEqual([1, 2, 3]);
  });

  it('treats an empty or missing directory as no versions', () => {
    const { selector, logs } = setup([]);
    expect(selector.resolve('/nowhere', PATTERN, 'next')._unsafeUnwrap()).toBe(1);
    expect(selector.resolve('/nowhere', PATTERN, 'latest')._unsafeUnwrapErr().code).toBe('NO_VERSIONS');
    expect(logs.messages()).toEqual(['Version not resolved']);
  });

  it('computes the next partition from all partitions present', () => {
    const { selector } = setup(['D_000001_cs-auth_P1.str.V1', 'D_000001_cs-auth_P3.str.V2', 'D_000001_cs_P7.str.V1']);
    expect(selector.nextPartition(DIR, 'D_000001_cs-auth_P*.str.V*')._unsafeUnwrap()).toBe(4);
    expect(selector.nextPartition(DIR, 'D_000001_model_P*.cif.V*')._unsafeUnwrap()).toBe(1);
  });

  it('surfaces listing failures', () => {
    const failing: DirectoryListingPort = {
      readdir: (): Result<readonly string[], FsError> => err({ code: 'FS_PERMISSION_DENIED', message: 'Permission denied: /x' }),
      readdirWithStats: (): Result<readonly DirEntryWithStats[], FsError> =>
        err({ code: 'FS_PERMISSION_DENIED', message: 'Permission denied: /x' }),
    };
    const selector = new VersionSelector(failing, new CapturingLoggerFactory());
    const error = selector.resolve('/x', PATTERN, 'latest')._unsafeUnwrapErr();
    expect(error.code).toBe('LISTING_FAILED');
    expect(error.message).toBe('Permission denied: /x');
  });
});
