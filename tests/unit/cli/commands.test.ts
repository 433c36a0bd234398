import { describe, it, expect, beforeEach } from 'vitest';
import {
  executeChemRefCommand,
  executeDirCommand,
  executeParseCommand,
  executePathCommand,
  executeReleasePathCommand,
  executeValidateCommand,
  executeVersionsCommand,
} from '../../../src/cli/commands/index.js';
import { ReleasePathInfo } from '../../../src/release/release-path-info.js';
import { ChemRefPathInfo } from '../../../src/locator/chem-ref-path-info.js';
import { CapturingLoggerFactory } from '../../helpers/test-logger.js';
import type { PathInfo } from '../../../src/locator/path-info.js';
import { createTestLocator, testSiteConfig } from '../../helpers/test-locator.js';

describe('CLI commands', () => {
  let pathInfo: PathInfo;

  beforeEach(() => {
    pathInfo = createTestLocator().pathInfo();
  });

  describe('path', () => {
    const deps = () => ({ getFilePath: (q: Parameters<PathInfo['getFilePath']>[0]) => pathInfo.getFilePath(q) });

    it('prints the path plainly', () => {
      expect(
        executePathCommand({ dataSetId: 'D_000001', contentType: 'model', formatType: 'pdbx', version: '2' }, deps())
      ).toEqual({
        kind: 'success',
        output: { message: '/data/archive/archive/D_000001/D_000001_model_P1.cif.V2', details: undefined, plain: true },
      });
    });

    it('fails with general_error when nothing resolves', () => {
      const result = executePathCommand({ dataSetId: 'D_000001', contentType: 'model', formatType: 'pdbx' }, deps());
      expect(result.kind).toBe('failure');
      if (result.kind === 'failure') {
        expect(result.exitCode).toEqual({ kind: 'general_error' });
        expect(result.output.message).toBe('No file path for D_000001 model/pdbx');
        expect(result.output.details).toEqual(['storage class: archive', 'version: latest', 'partition: 1']);
      }
    });

    it('turns an unknown storage class into misuse', () => {
      const result = executePathCommand(
        { dataSetId: 'D_000001', contentType: 'model', formatType: 'pdbx', storageClass: 'attic' },
        deps()
      );
      expect(result.kind === 'failure' ? result.exitCode : null).toEqual({ kind: 'misuse' });
    });
  });

  describe('dir', () => {
    it('prints the directory', () => {
      const result = executeDirCommand({ dataSetId: 'D_000001', storageClass: 'deposit' }, { getDirPath: (q) => pathInfo.getDirPath(q) });
      expect(result.kind === 'success' ? result.output?.message : null).toBe('/data/archive/deposit/D_000001');
    });

    it('fails when keys are missing', () => {
      const result = executeDirCommand({ dataSetId: 'D_000001', storageClass: 'wf-instance' }, { getDirPath: (q) => pathInfo.getDirPath(q) });
      expect(result.kind === 'failure' ? result.output.message : null).toBe('No directory for D_000001 in wf-instance');
    });
  });

  describe('parse', () => {
    const deps = () => ({
      parseFileName: (f: string) => pathInfo.parseFileName(f),
      splitFileName: (f: string) => pathInfo.splitFileName(f),
    });

    it('describes every field', () => {
      const result = executeParseCommand('D_000001_model_P1.cif.V1', {}, deps());
      expect(result.kind === 'success' ? result.output?.details : null).toEqual([
        'dataSetId: D_000001',
        'contentType: model',
        'formatType: pdbx',
        'partition: 1',
        'version: 1',
      ]);
    });

    it('falls back to a partial split on request', () => {
      const result = executeParseCommand('D_000001_model.cif.V1', { partial: true }, deps());
      expect(result.kind === 'success' ? result.output?.message : null).toBe('D_000001_model.cif.V1 (partial)');
      expect(result.kind === 'success' ? result.output?.details : null).toEqual([
        'dataSetId: D_000001',
        'contentType: model',
        'formatType: -',
        'partition: -',
        'version: 1',
      ]);
    });

    it('fails on a non-conforming name', () => {
      const result = executeParseCommand('D_000001_model.cif.V1', {}, deps());
      expect(result.kind === 'failure' ? result.output.message : null).toBe('Not a managed filename: D_000001_model.cif.V1');
    });
  });

  describe('validate', () => {
    const deps = () => ({ isValidFileName: (f: string, r: boolean) => pathInfo.isValidFileName(f, r) });

    it('lists invalid names', () => {
      const result = executeValidateCommand(['D_000001_model_P1.cif.V1', 'D_000001_model_P1.cif'], { requireVersion: true }, deps());
      expect(result.kind === 'failure' ? result.output : null).toEqual({
        message: '1 of 2 filenames invalid',
        details: ['D_000001_model_P1.cif'],
        suggestions: undefined,
      });
    });

    it('accepts unversioned names when allowed', () => {
      const result = executeValidateCommand(['D_000001_model_P1.cif'], { requireVersion: false }, deps());
      expect(result).toEqual({ kind: 'success', output: { message: '1 filename valid' } });
    });
  });

  describe('versions', () => {
    const files = [
      { filePath: '/a/D_000001_model_P1.cif.V3', fileName: 'D_000001_model_P1.cif.V3', version: 3 },
      { filePath: '/a/D_000001_model_P1.cif.V2', fileName: 'D_000001_model_P1.cif.V2', version: 2 },
      { filePath: '/a/D_000001_model_P1.cif.V1', fileName: 'D_000001_model_P1.cif.V1', version: 1 },
    ];
    const deps = {
      getVersionFileList: () => files,
      getPurgeCandidates: () => ({
        latest: '/a/D_000001_model_P1.cif.V3',
        remove: [],
        compress: ['/a/D_000001_model_P1.cif.V2', '/a/D_000001_model_P1.cif.V1'],
      }),
    };

    it('lists versions', () => {
      const result = executeVersionsCommand({ dataSetId: 'D_000001' }, {}, deps);
      expect(result).toEqual({
        kind: 'success',
        output: {
          message: '3 versions',
          details: ['V3  /a/D_000001_model_P1.cif.V3', 'V2  /a/D_000001_model_P1.cif.V2', 'V1  /a/D_000001_model_P1.cif.V1'],
        },
      });
    });

    it('adds purge candidates', () => {
      const result = executeVersionsCommand({ dataSetId: 'D_000001' }, { purge: 'exp' }, deps);
      expect(result.kind === 'success' ? result.output?.message : null).toBe('3 versions (purge strategy exp)');
      expect(result.kind === 'success' ? result.output?.details?.slice(3) : null).toEqual([
        'keep: /a/D_000001_model_P1.cif.V3',
        'compress: /a/D_000001_model_P1.cif.V2',
        'compress: /a/D_000001_model_P1.cif.V1',
      ]);
    });

    it('fails when nothing is found', () => {
      const result = executeVersionsCommand(
        { dataSetId: 'D_000001', contentType: 'structure-factors' },
        {},
        { ...deps, getVersionFileList: () => [] }
      );
      expect(result.kind === 'failure' ? result.output.message : null).toBe('No versions found for D_000001 structure-factors');
    });
  });

  describe('release-path', () => {
    const release = new ReleasePathInfo(testSiteConfig());
    const deps = { getForReleasePath: (q: Parameters<ReleasePathInfo['getForReleasePath']>[0]) => release.getForReleasePath(q) };

    it('prints the directory', () => {
      expect(executeReleasePathCommand({ subdir: 'emd', accession: 'EMD-1234', emSubPath: 'map' }, deps)).toEqual({
        kind: 'success',
        output: { message: '/data/archive/for-release/emd/EMD-1234/map', details: undefined, plain: true },
      });
    });

    it('reports bad names as misuse', () => {
      const result = executeReleasePathCommand({ subdir: 'bogus' }, deps);
      expect(result).toEqual({
        kind: 'failure',
        exitCode: { kind: 'misuse' },
        output: {
          message: "Release subdir 'bogus' not allowed (expected one of: added, modified, obsolete, emd, val_reports, em-val-reports)",
          suggestions: undefined,
        },
      });
    });
  });

  describe('chem-ref', () => {
    function depsFor(sandboxRoot: string | null) {
      const info = new ChemRefPathInfo(testSiteConfig({ refData: { sandboxRoot } }), new CapturingLoggerFactory());
      return { getIdType: (id: string) => info.getIdType(id), getFilePath: (id: string) => info.getFilePath(id) };
    }

    it('prints the repository path', () => {
      expect(executeChemRefCommand('atp', depsFor('/data/refdata'))).toEqual({
        kind: 'success',
        output: { message: '/data/refdata/ligand-dict-v3/A/ATP/ATP.cif', details: undefined, plain: true },
      });
    });

    it('reports an unrecognized id as misuse', () => {
      const result = executeChemRefCommand('XYZ_12345', depsFor('/data/refdata'));
      expect(result.kind === 'failure' ? result.exitCode : null).toEqual({ kind: 'misuse' });
    });

    it('fails without a sandbox', () => {
      const result = executeChemRefCommand('PRD_000001', depsFor(null));
      expect(result.kind === 'failure' ? result.output.message : null).toBe('No repository path for PRD_000001 (PRD)');
      expect(result.kind === 'failure' ? result.exitCode : null).toEqual({ kind: 'general_error' });
    });
  });
});
