import type { ContentCatalogData } from '../config/content-catalog.schema.js';

/** Format wildcard accepted by template lookups; has no extension of its own. */
export const ANY_FORMAT = 'any';

export interface ResolvedContentType {
  readonly base: string;
  readonly milestone: string | null;
}

/**
 * Read-only lookup tables between symbolic names and the tokens that appear
 * in filenames: content type ↔ token, format ↔ extension, and milestone variants
 * (`model` + `upload` → `model-upload`).
 */
export class ContentTypeCatalog {
  private readonly extensionByFormat: ReadonlyMap<string, string>;
  // Declaration order; several formats may share one extension (`xml`, `pdbml`).
  private readonly formatsByExtension: ReadonlyMap<string, readonly string[]>;
  private readonly tokenByContentType: ReadonlyMap<string, string>;
  private readonly contentTypeByToken: ReadonlyMap<string, string>;
  private readonly formatsByContentType: ReadonlyMap<string, ReadonlySet<string>>;
  // Longest first, so `upload-convert` is tried before `upload`.
  private readonly milestoneList: readonly string[];

  constructor(data: ContentCatalogData) {
    const extensionByFormat = new Map<string, string>();
    const formatsByExtension = new Map<string, string[]>();
    for (const [format, ext] of Object.entries(data.formatExtensions)) {
      extensionByFormat.set(format, ext);
      const shared = formatsByExtension.get(ext);
      if (shared === undefined) formatsByExtension.set(ext, [format]);
      else shared.push(format);
    }

    const tokenByContentType = new Map<string, string>();
    const contentTypeByToken = new Map<string, string>();
    const formatsByContentType = new Map<string, ReadonlySet<string>>();
    for (const [contentType, entry] of Object.entries(data.contentTypes)) {
      tokenByContentType.set(contentType, entry.token);
      contentTypeByToken.set(entry.token, contentType);
      formatsByContentType.set(contentType, new Set(entry.formats));
    }

    this.extensionByFormat = extensionByFormat;
    this.formatsByExtension = formatsByExtension;
    this.tokenByContentType = tokenByContentType;
    this.contentTypeByToken = contentTypeByToken;
    this.formatsByContentType = formatsByContentType;
    this.milestoneList = [...data.milestones].sort((a, b) => b.length - a.length);
  }

  get milestones(): readonly string[] {
    return [...this.milestoneList].sort();
  }

  get contentTypes(): readonly string[] {
    return [...this.tokenByContentType.keys()];
  }

  get formatTypes(): readonly string[] {
    return [...this.extensionByFormat.keys()];
  }

  extensionFor(formatType: string): string | null {
    return this.extensionByFormat.get(formatType) ?? null;
  }

  /**
   * When several formats share an extension, the first one allowed for
   * `contentType` wins (`model` + `xml` → `pdbml`), else the first declared.
   * `contentType` may carry a milestone suffix.
   */
  formatForExtension(extension: string, contentType?: string | null): string | null {
    const candidates = this.formatsByExtension.get(extension);
    if (candidates === undefined) return null;
    const base = contentType === undefined || contentType === null ? null : this.resolveContentType(contentType)?.base;
    if (base !== undefined && base !== null) {
      const allowed = candidates.find((format) => this.isFormatAllowed(base, format));
      if (allowed !== undefined) return allowed;
    }
    return candidates[0] ?? null;
  }

  tokenFor(contentTypeBase: string, milestone?: string | null): string | null {
    const token = this.tokenByContentType.get(contentTypeBase);
    if (token === undefined) return null;
    if (milestone === undefined || milestone === null) return token;
    return this.isMilestone(milestone) ? `${token}-${milestone}` : null;
  }

  /** Inverse of {@link tokenFor}; milestone tokens map to the effective type (`sf-deposit` → `structure-factors-deposit`). */
  contentTypeForToken(token: string): string | null {
    const direct = this.contentTypeByToken.get(token);
    if (direct !== undefined) return direct;

    for (const milestone of this.milestoneList) {
      const suffix = `-${milestone}`;
      if (!token.endsWith(suffix)) continue;
      const base = this.contentTypeByToken.get(token.slice(0, -suffix.length));
      if (base !== undefined) return `${base}-${milestone}`;
    }
    return null;
  }

  /** Splits an effective content type (`model-upload`) into base and milestone. */
  resolveContentType(effective: string): ResolvedContentType | null {
    if (this.tokenByContentType.has(effective)) return { base: effective, milestone: null };

    for (const milestone of this.milestoneList) {
      const suffix = `-${milestone}`;
      if (!effective.endsWith(suffix)) continue;
      const base = effective.slice(0, -suffix.length);
      if (this.tokenByContentType.has(base)) return { base, milestone };
    }
    return null;
  }

  isFormatAllowed(contentTypeBase: string, formatType: string): boolean {
    if (formatType === ANY_FORMAT) return true;
    return this.formatsByContentType.get(contentTypeBase)?.has(formatType) ?? false;
  }

  isMilestone(value: string): boolean {
    return this.milestoneList.includes(value);
  }
}
