import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type CatalogLoadFailedError = Readonly<{
  readonly _tag: 'CatalogLoadFailed';
  readonly source: string;
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | CatalogLoadFailedError | UnexpectedError;

/**
 * Branded marker for configuration that went through `loadSiteConfig`
 * (or the explicit test constructor).
 */
export type Validated<T> = Brand<T, 'Validated'>;
