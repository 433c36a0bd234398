import type {
  AppError,
  CatalogLoadFailedError,
  ConfigIssue,
  ConfigInvalidError,
  UnexpectedError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid site configuration',
  }),

  catalogLoadFailed: (source: string, issues: readonly ConfigIssue[]): CatalogLoadFailedError => ({
    _tag: 'CatalogLoadFailed',
    source,
    issues,
    message: `Content catalog could not be loaded from ${source}`,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
