import { describe, it, expect } from 'vitest';
import { StorageLocationResolver } from '../../../src/locator/storage-location-resolver.js';
import { asDataSetId } from '../../../src/types/data-set-id.js';
import type { DataSetId } from '../../../src/types/data-set-id.js';
import type { StorageClass } from '../../../src/types/storage-class.js';
import { testSiteConfig } from '../../helpers/test-locator.js';

function id(value: string): DataSetId {
  const parsed = asDataSetId(value);
  if (parsed === null) throw new Error(`bad test id ${value}`);
  return parsed;
}

describe('StorageLocationResolver', () => {
  const D = id('D_000001');

  describe('with a distinct UI root', () => {
    const resolver = new StorageLocationResolver(testSiteConfig({ uiRoot: '/data/ui' }));

    const cases: [StorageClass, string][] = [
      ['archive', '/data/archive/archive/D_000001'],
      ['wf-archive', '/data/archive/archive/D_000001'],
      ['autogroup', '/data/archive/autogroup/D_000001'],
      ['deposit', '/data/archive/deposit/D_000001'],
      ['deposit-ui', '/data/ui/deposit/D_000001'],
      ['tempdep', '/data/ui/tempdep/D_000001'],
      ['uploads', '/data/ui/deposit-ui/uploads/D_000001'],
      ['pickles', '/data/archive/deposit/temp_files/deposition-pickles/D_000001'],
    ];

    it.each(cases)('%s → %s', (storageClass, expected) => {
      expect(resolver.resolve(storageClass, { dataSetId: D })._unsafeUnwrap()).toBe(expected);
    });
  });

  describe('without a UI root', () => {
    const resolver = new StorageLocationResolver(testSiteConfig());

    it('falls back to the archive root', () => {
      expect(resolver.resolve('deposit-ui', { dataSetId: D })._unsafeUnwrap()).toBe('/data/archive/deposit/D_000001');
      expect(resolver.resolve('tempdep', { dataSetId: D })._unsafeUnwrap()).toBe('/data/archive/tempdep/D_000001');
      expect(resolver.resolve('uploads', { dataSetId: D })._unsafeUnwrap()).toBe(
        '/data/archive/deposit/temp_files/deposition_uploads/D_000001'
      );
    });

    it('treats a UI root equal to the archive root as absent', () => {
      const same = new StorageLocationResolver(testSiteConfig({ uiRoot: '/data/archive/' }));
      expect(same.resolve('tempdep', { dataSetId: D })._unsafeUnwrap()).toBe('/data/archive/tempdep/D_000001');
    });
  });

  const resolver = new StorageLocationResolver(testSiteConfig());

  it('puts group ids under autogroup for archive storage', () => {
    expect(resolver.resolve('archive', { dataSetId: id('G_1002001') })._unsafeUnwrap()).toBe(
      '/data/archive/autogroup/G_1002001'
    );
  });

  it('resolves workflow instances', () => {
    expect(resolver.resolve('wf-instance', { dataSetId: D, workflowInstanceId: 'W_000002' })._unsafeUnwrap()).toBe(
      '/data/archive/workflow/D_000001/instance/W_000002'
    );
  });

  it('resolves session classes from the session root', () => {
    expect(resolver.resolve('session', { sessionRoot: '/tmp/sessions/abc' })._unsafeUnwrap()).toBe('/tmp/sessions/abc');
    expect(resolver.resolve('wf-session', { sessionRoot: '/tmp/sessions/abc' })._unsafeUnwrap()).toBe('/tmp/sessions/abc');
    expect(resolver.resolve('session-download', { sessionRoot: '/tmp/sessions/abc' })._unsafeUnwrap()).toBe(
      '/tmp/sessions/abc/downloads'
    );
  });

  it('returns an error naming the missing key', () => {
    expect(resolver.resolve('archive', {})._unsafeUnwrapErr()).toEqual({
      code: 'STORAGE_KEY_MISSING',
      storageClass: 'archive',
      key: 'dataSetId',
      message: "Storage class 'archive' requires dataSetId",
    });
    expect(resolver.resolve('wf-instance', { dataSetId: D })._unsafeUnwrapErr().key).toBe('workflowInstanceId');
    expect(resolver.resolve('session', { dataSetId: D })._unsafeUnwrapErr().key).toBe('sessionRoot');
  });
});
