/**
 * Thrown error types.
 *
 * Only caller defects are thrown: a storage class or release-area name outside
 * the closed set. Missing data (unknown content type, no such version, unparseable
 * filename) is returned as `null` or a `Result` error instead.
 */

export enum LocatorErrorCodes {
  INVALID_STORAGE_CLASS = 'INVALID_STORAGE_CLASS',
  INVALID_SUBDIRECTORY = 'INVALID_SUBDIRECTORY',
}

export class LocatorError extends Error {
  public readonly code: LocatorErrorCodes;
  public readonly data?: Readonly<Record<string, unknown>>;

  constructor(code: LocatorErrorCodes, message: string, data?: Readonly<Record<string, unknown>>) {
    super(message);
    this.name = 'LocatorError';
    this.code = code;
    this.data = data;
  }
}

export class InvalidStorageClassError extends LocatorError {
  constructor(storageClass: string, allowed: readonly string[]) {
    super(
      LocatorErrorCodes.INVALID_STORAGE_CLASS,
      `Storage class '${storageClass}' is not one of: ${allowed.join(', ')}`,
      { storageClass, allowed }
    );
    this.name = 'InvalidStorageClassError';
  }
}

export class InvalidSubdirectoryError extends LocatorError {
  constructor(kind: 'subdir' | 'version' | 'em-sub-path', value: string, allowed: readonly string[]) {
    super(
      LocatorErrorCodes.INVALID_SUBDIRECTORY,
      `Release ${kind} '${value}' not allowed (expected one of: ${allowed.join(', ')})`,
      { kind, value, allowed }
    );
    this.name = 'InvalidSubdirectoryError';
  }
}

export function isLocatorError(e: unknown): e is LocatorError {
  return e instanceof LocatorError;
}
