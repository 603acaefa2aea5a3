import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type UsageError = Readonly<{
  readonly _tag: 'UsageError';
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * Filesystem step that failed. Kept as data so the CLI can tailor suggestions.
 */
export type IoOperation =
  | 'create_workspace'
  | 'list_artifacts'
  | 'hash_artifact'
  | 'lock_workspace'
  | 'unlock_workspace'
  | 'relocate_output'
  | 'clean';

export type IoError = Readonly<{
  readonly _tag: 'IoError';
  readonly operation: IoOperation;
  readonly path: string;
  readonly message: string;
}>;

export type WorkspaceBusyError = Readonly<{
  readonly _tag: 'WorkspaceBusy';
  readonly lockPath: string;
  readonly message: string;
}>;

export type EngineFailure =
  | { readonly kind: 'exit_code'; readonly code: number }
  | { readonly kind: 'signal'; readonly signal: string }
  | { readonly kind: 'spawn_failed'; readonly reason: string };

export type CompileError = Readonly<{
  readonly _tag: 'CompileError';
  readonly engine: string;
  /** Zero-based attempt that failed. */
  readonly attempt: number;
  readonly failure: EngineFailure;
  /** Combined stdout/stderr captured from the engine. Empty when it never started. */
  readonly output: string;
  readonly message: string;
}>;

/** A signal asked the run to stop; the engine was killed and the lock released. */
export type InterruptedError = Readonly<{
  readonly _tag: 'Interrupted';
  /** Zero-based attempt that was running or about to run. */
  readonly attempt: number;
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError =
  | UsageError
  | ConfigInvalidError
  | IoError
  | WorkspaceBusyError
  | CompileError
  | InterruptedError
  | UnexpectedError;

/** Errors a compile run can end with. */
export type CompileAppError = IoError | WorkspaceBusyError | CompileError | InterruptedError;

/**
 * Not an error: the ceiling was reached while artifacts were still moving.
 * Travels inside a successful outcome.
 */
export type ConvergenceWarning = Readonly<{
  readonly _tag: 'ConvergenceWarning';
  readonly attempts: number;
  readonly message: string;
}>;

/**
 * Branded marker for validated config.
 * (Kept here so callers can require a validated version without runtime checks.)
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
