import { describe, it, expect, beforeEach } from 'vitest';
import { DataFileReference } from '../../../src/locator/data-file-reference.js';
import { InvalidStorageClassError } from '../../../src/core/error-handler.js';
import { createTestLocator } from '../../helpers/test-locator.js';
import type { TestLocator } from '../../helpers/test-locator.js';

const ARCHIVE_DIR = '/data/archive/archive/D_000001';

describe('DataFileReference', () => {
  let t: TestLocator;

  beforeEach(() => {
    t = createTestLocator({ uiRoot: '/data/ui' });
  });

  function modelRef(): DataFileReference {
    return new DataFileReference(t.deps).setDataSetId('D_000001').setContentTypeAndFormat('model', 'pdbx');
  }

  describe('concrete references', () => {
    it('composes directory and filename', () => {
      const ref = modelRef().setVersionId(2);
      expect(ref.isReferenceValid()).toBe(true);
      expect(ref.getDirPathReference()).toBe(ARCHIVE_DIR);
      expect(ref.getFilePathReference()).toBe(`${ARCHIVE_DIR}/D_000001_model_P1.cif.V2`);
      expect(ref.getFileName()).toBe('D_000001_model_P1.cif.V2');
    });

    it('omits the suffix for version none', () => {
      expect(modelRef().setVersionId('none').getFileName()).toBe('D_000001_model_P1.cif');
    });

    it('renders numbers without leading zeros', () => {
      expect(modelRef().setPartitionNumber('02').setVersionId('007').getFileName()).toBe('D_000001_model_P2.cif.V7');
    });

    it('applies a milestone to the token', () => {
      expect(modelRef().setMilestone('upload').setVersionId(1).getFileName()).toBe('D_000001_model-upload_P1.cif.V1');
    });

    it('accepts an effective content type carrying the milestone', () => {
      const ref = new DataFileReference(t.deps)
        .setDataSetId('D_000001')
        .setContentTypeAndFormat('structure-factors-deposit', 'mtz')
        .setVersionId(3);
      expect(ref.getFileName()).toBe('D_000001_sf-deposit_P1.mtz.V3');
    });

    it('follows the storage class', () => {
      const ref = modelRef().setStorageType('deposit-ui').setVersionId(1);
      expect(ref.getFilePathReference()).toBe('/data/ui/deposit/D_000001/D_000001_model_P1.cif.V1');
    });
  });

  describe('symbolic versions', () => {
    beforeEach(() => {
      t.listing.addFiles(ARCHIVE_DIR, [
        'D_000001_model_P1.cif.V1',
        'D_000001_model_P1.cif.V2',
        'D_000001_model_P2.cif.V9',
      ]);
    });

    it('resolves latest, next and previous within the partition', () => {
      expect(modelRef().getFileName()).toBe('D_000001_model_P1.cif.V2');
      expect(modelRef().setVersionId('next').getFileName()).toBe('D_000001_model_P1.cif.V3');
      expect(modelRef().setVersionId('previous').getFileName()).toBe('D_000001_model_P1.cif.V1');
      expect(modelRef().setPartitionNumber(2).setVersionId('latest').getFileName()).toBe('D_000001_model_P2.cif.V9');
    });

    it('returns null when nothing matches', () => {
      expect(modelRef().setPartitionNumber(3).getFilePathReference()).toBeNull();
      expect(modelRef().setPartitionNumber(2).setVersionId('previous').getFilePathReference()).toBeNull();
    });

    it('allocates the next partition before the version', () => {
      expect(modelRef().setPartitionNumber('next').setVersionId('next').getFileName()).toBe('D_000001_model_P3.cif.V1');
    });
  });

  describe('invalid references', () => {
    it('rejects malformed ids, partitions and versions', () => {
      expect(modelRef().setDataSetId('D000001').isReferenceValid()).toBe(false);
      expect(modelRef().setVersionId(0).isReferenceValid()).toBe(false);
      expect(modelRef().setVersionId('newest').isReferenceValid()).toBe(false);
      expect(modelRef().setPartitionNumber(-1).isReferenceValid()).toBe(false);
    });

    it('rejects unknown or disallowed formats and content types', () => {
      const ref = () => new DataFileReference(t.deps).setDataSetId('D_000001');
      expect(ref().setContentTypeAndFormat('model', 'mtz').isReferenceValid()).toBe(false);
      expect(ref().setContentTypeAndFormat('model', 'not-a-format').isReferenceValid()).toBe(false);
      expect(ref().setContentTypeAndFormat('not-a-type', 'pdbx').getFilePathReference()).toBeNull();
      expect(ref().isReferenceValid()).toBe(false);
    });

    it('rejects a milestone outside the catalog', () => {
      expect(modelRef().setMilestone('final').isReferenceValid()).toBe(false);
    });

    it('is invalid when storage keys are missing', () => {
      const ref = modelRef().setStorageType('wf-instance');
      expect(ref.getDirPathReference()).toBeNull();
      expect(ref.isReferenceValid()).toBe(false);
      expect(ref.setWorkflowInstanceId('W_000001').getDirPathReference()).toBe(
        '/data/archive/workflow/D_000001/instance/W_000001'
      );
    });

    it('logs unresolved paths at debug', () => {
      modelRef().setVersionId('newest').getFilePathReference();
      expect(t.logs.entries.map((e) => [e.level, e.msg])).toEqual([[20, 'Invalid file reference']]);
    });

    it('throws for an unknown storage class', () => {
      expect(() => modelRef().setStorageType('attic')).toThrow(InvalidStorageClassError);
    });

    it('gives no concrete path for format any', () => {
      const ref = new DataFileReference(t.deps).setDataSetId('D_000001').setContentTypeAndFormat('model', 'any');
      expect(ref.isReferenceValid()).toBe(true);
      expect(ref.getFilePathReference()).toBeNull();
    });
  });

  describe('search targets', () => {
    it('wildcards the version', () => {
      expect(modelRef().setPartitionNumber(2).getVersionIdSearchTarget()).toBe('D_000001_model_P2.cif.V*');
      expect(modelRef().setPartitionNumber('next').getVersionIdSearchTarget()).toBeNull();
    });

    it('wildcards partition and version', () => {
      expect(modelRef().getPartitionNumberSearchTarget()).toBe('D_000001_model_P*.cif.V*');
    });

    it('wildcards token and extension when unset', () => {
      expect(new DataFileReference(t.deps).setDataSetId('D_000001').getContentTypeSearchTarget()).toBe(
        'D_000001_*_P*.*.V*'
      );
      expect(
        new DataFileReference(t.deps)
          .setDataSetId('D_000001')
          .setContentTypeAndFormat('structure-factors', 'any')
          .getContentTypeSearchTarget()
      ).toBe('D_000001_sf_P*.*.V*');
      expect(modelRef().getContentTypeSearchTarget()).toBe('D_000001_model_P*.cif.V*');
    });

    it('gives null without a dataset id or with an unknown content type', () => {
      expect(new DataFileReference(t.deps).getContentTypeSearchTarget()).toBeNull();
      expect(
        new DataFileReference(t.deps)
          .setDataSetId('D_000001')
          .setContentTypeAndFormat('not-a-type', 'any')
          .getContentTypeSearchTarget()
      ).toBeNull();
    });
  });
});
