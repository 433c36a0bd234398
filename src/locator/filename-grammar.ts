import { parseDigits } from '../types/version-request.js';

/**
 * Managed filename grammar:
 *
 *   {dataSetId}_{contentTypeToken}_P{partition}.{extension}.V{version}
 *
 * e.g. `D_1000000001_model_P1.cif.V3`. Templates use `*` in place of the
 * partition or version, or drop the `.V` suffix entirely.
 */

export type FieldOrWildcard = number | '*';

export interface FileNameFields {
  readonly dataSetId: string;
  readonly contentTypeToken: string;
  readonly extension: string;
  readonly partition: FieldOrWildcard;
  /** `null` renders without a version suffix. */
  readonly version: FieldOrWildcard | null;
}

export interface ParsedFileComponents {
  readonly dataSetId: string;
  readonly contentTypeToken: string;
  readonly extension: string;
  readonly partition: number;
  readonly version: number | null;
}

export interface SplitFileComponents {
  readonly dataSetId: string | null;
  readonly contentTypeToken: string | null;
  readonly extension: string | null;
  readonly partition: number | null;
  readonly version: number | null;
}

const VERSION_SEGMENT = /^V(\d+)$/;
const PARTITION_SEGMENT = /^P(\d+)$/;
const ID_AND_TOKEN = /^([A-Za-z0-9]+_[A-Za-z0-9]+)_(.+)$/;
const ID_SEGMENT = /^[A-Za-z0-9]+$/;

export function renderFileName(fields: FileNameFields): string {
  const stem = `${fields.dataSetId}_${fields.contentTypeToken}_P${String(fields.partition)}.${fields.extension}`;
  return fields.version === null ? stem : `${stem}.V${String(fields.version)}`;
}

/**
 * Structural parse; tokens and extensions are not checked against the catalog.
 * Any deviation from the grammar gives `null`.
 */
export function parseFileName(
  fileName: string,
  options: { readonly requireVersion: boolean } = { requireVersion: true }
): ParsedFileComponents | null {
  const lastDot = fileName.lastIndexOf('.');
  if (lastDot < 0) return null;

  let remainder = fileName;
  let version: number | null = null;
  const versionMatch = VERSION_SEGMENT.exec(fileName.slice(lastDot + 1));
  if (versionMatch) {
    version = parseDigits(versionMatch[1] ?? '');
    if (version === null) return null;
    remainder = fileName.slice(0, lastDot);
  }
  if (version === null && options.requireVersion) return null;

  const extDot = remainder.lastIndexOf('.');
  if (extDot <= 0 || extDot === remainder.length - 1) return null;
  const base = remainder.slice(0, extDot);
  const extension = remainder.slice(extDot + 1);

  const partitionAt = base.lastIndexOf('_P');
  if (partitionAt < 0) return null;
  const partition = parseDigits(base.slice(partitionAt + 2));
  if (partition === null) return null;

  const idAndToken = ID_AND_TOKEN.exec(base.slice(0, partitionAt));
  if (!idAndToken) return null;
  const [, dataSetId, contentTypeToken] = idAndToken;
  if (dataSetId === undefined || contentTypeToken === undefined) return null;

  return { dataSetId, contentTypeToken, extension, partition, version };
}

export function isValidFileName(fileName: string, requireVersion = true): boolean {
  return parseFileName(fileName, { requireVersion }) !== null;
}

/**
 * Best-effort decomposition of names that may not follow the grammar fully.
 * Reads id, token and partition left to right from the part before the first
 * `.`; the extension only once a partition was found; the version independently
 * from the last `.` segment.
 */
export function splitFileName(fileName: string): SplitFileComponents {
  const dotSegments = fileName.split('.');
  const stem = dotSegments[0] ?? '';
  const parts = stem.split('_');

  const prefix = parts[0];
  const code = parts[1];
  const dataSetId =
    prefix !== undefined && code !== undefined && ID_SEGMENT.test(prefix) && ID_SEGMENT.test(code)
      ? `${prefix}_${code}`
      : null;

  const tokenPart = parts[2];
  const contentTypeToken = dataSetId !== null && tokenPart !== undefined && tokenPart !== '' ? tokenPart : null;

  const partitionMatch = contentTypeToken !== null ? PARTITION_SEGMENT.exec(parts[3] ?? '') : null;
  const partition = partitionMatch ? parseDigits(partitionMatch[1] ?? '') : null;

  const extensionPart = dotSegments[1];
  const extension =
    partition !== null && extensionPart !== undefined && extensionPart !== '' && !VERSION_SEGMENT.test(extensionPart)
      ? extensionPart
      : null;

  const version = dotSegments.length > 1 ? parseVersionSuffix(fileName) : null;

  return { dataSetId, contentTypeToken, extension, partition, version };
}

/** Version from a trailing `.V<n>` segment, or null. */
export function parseVersionSuffix(fileName: string): number | null {
  const lastDot = fileName.lastIndexOf('.');
  if (lastDot < 0) return null;
  const m = VERSION_SEGMENT.exec(fileName.slice(lastDot + 1));
  return m ? parseDigits(m[1] ?? '') : null;
}
