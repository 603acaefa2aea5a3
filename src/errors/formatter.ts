import type { AppError, ConfigIssue } from './app-error.js';
import { assertNever } from '../runtime/assert-never.js';

/**
 * Render any application error for a human. Deterministic: the same error
 * always renders to the same text.
 */
export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'UsageError':
    case 'IoError':
    case 'WorkspaceBusy':
    case 'CompileError':
    case 'Interrupted':
      return error.message;

    case 'ConfigInvalid':
      return [error.message, '', ...issueLines(error.issues)].join('\n');

    case 'Unexpected':
      return `${error.message}\nCause: ${describeCause(error.cause)}`;

    default:
      return assertNever(error);
  }
}

function issueLines(issues: readonly ConfigIssue[]): string[] {
  if (issues.length === 0) return ['  - (no details)'];
  return issues.map((issue) => `  - ${issue.path}: ${issue.message}`);
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    // Circular or otherwise unserializable.
    return String(cause);
  }
}
