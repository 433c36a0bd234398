/**
 * What a caller asks for when naming a file version. Concrete numbers are
 * positive integers; the symbolic kinds are resolved against a directory listing.
 */
export type VersionRequest =
  | { readonly kind: 'exact'; readonly version: number }
  | { readonly kind: 'latest' }
  | { readonly kind: 'next' }
  | { readonly kind: 'previous' }
  | { readonly kind: 'none' };

export type SymbolicVersion = Exclude<VersionRequest, { kind: 'exact' }>['kind'];

export type PartitionRequest =
  | { readonly kind: 'exact'; readonly partition: number }
  | { readonly kind: 'next' };

const SYMBOLIC: readonly SymbolicVersion[] = ['latest', 'next', 'previous', 'none'];

export function isPositiveInteger(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0;
}

/** Accepts a positive integer (number or digit string, leading zeros allowed) or a symbolic name. */
export function parseVersionRequest(raw: string | number): VersionRequest | null {
  if (typeof raw === 'number') {
    return isPositiveInteger(raw) ? { kind: 'exact', version: raw } : null;
  }
  const lowered = raw.trim().toLowerCase();
  const symbolic = SYMBOLIC.find((s) => s === lowered);
  if (symbolic !== undefined) return { kind: symbolic };
  const n = parseDigits(lowered);
  return n === null ? null : { kind: 'exact', version: n };
}

export function parsePartitionRequest(raw: string | number): PartitionRequest | null {
  if (typeof raw === 'number') {
    return isPositiveInteger(raw) ? { kind: 'exact', partition: raw } : null;
  }
  const lowered = raw.trim().toLowerCase();
  if (lowered === 'next') return { kind: 'next' };
  const n = parseDigits(lowered);
  return n === null ? null : { kind: 'exact', partition: n };
}

export function parseDigits(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const n = Number.parseInt(value, 10);
  return isPositiveInteger(n) ? n : null;
}
