export type {
  AppError,
  CatalogLoadFailedError,
  ConfigIssue,
  ConfigInvalidError,
  UnexpectedError,
  Validated,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
