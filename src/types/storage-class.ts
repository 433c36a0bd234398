import { InvalidStorageClassError } from '../core/error-handler.js';

export const STORAGE_CLASSES = [
  'archive',
  'wf-archive',
  'autogroup',
  'deposit',
  'deposit-ui',
  'tempdep',
  'uploads',
  'wf-instance',
  'session',
  'wf-session',
  'session-download',
  'pickles',
] as const;

export type StorageClass = (typeof STORAGE_CLASSES)[number];

const ALIASES: Readonly<Record<string, StorageClass>> = {
  'workflow-instance': 'wf-instance',
};

export function isStorageClass(value: string): value is StorageClass {
  return STORAGE_CLASSES.some((c) => c === value);
}

/** @throws InvalidStorageClassError for anything outside {@link STORAGE_CLASSES}. */
export function parseStorageClass(value: string): StorageClass {
  if (isStorageClass(value)) return value;
  const alias = ALIASES[value];
  if (alias !== undefined) return alias;
  throw new InvalidStorageClassError(value, STORAGE_CLASSES);
}

export function isSessionClass(storageClass: StorageClass): boolean {
  return storageClass === 'session' || storageClass === 'wf-session' || storageClass === 'session-download';
}
