import type { AppError, ConfigIssue } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid':
      return `${error.message}\n\n${formatIssues(error.issues)}`;

    case 'CatalogLoadFailed':
      return `${error.message}\n\n${formatIssues(error.issues)}`;

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function formatIssues(issues: readonly ConfigIssue[]): string {
  return issues.length
    ? issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
    : '  - (no details)';
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
