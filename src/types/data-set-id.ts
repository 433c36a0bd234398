import type { Brand } from '../runtime/brand.js';

/**
 * Dataset identifier: prefix and code, e.g. `D_1000000001` (workflow dataset)
 * or `G_1002001` (deposition group). Exactly one `_`, so the id is always the
 * first two `_`-separated segments of a managed filename.
 */
export type DataSetId = Brand<string, 'DataSetId'>;

const DATA_SET_ID = /^[A-Za-z0-9]+_[A-Za-z0-9]+$/;

export function asDataSetId(value: string): DataSetId | null {
  return DATA_SET_ID.test(value) ? (value as DataSetId) : null;
}

export function isGroupId(id: DataSetId): boolean {
  return id.startsWith('G_');
}
