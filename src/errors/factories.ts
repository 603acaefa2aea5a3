import type {
  AppError,
  CompileError,
  ConfigInvalidError,
  ConfigIssue,
  ConvergenceWarning,
  EngineFailure,
  IoError,
  InterruptedError,
  IoOperation,
  UnexpectedError,
  UsageError,
  WorkspaceBusyError,
} from './app-error.js';

const IO_VERBS: Record<IoOperation, string> = {
  create_workspace: 'Create temporary directory',
  list_artifacts: 'List auxiliary files',
  hash_artifact: 'Hash auxiliary file',
  lock_workspace: 'Lock workspace',
  unlock_workspace: 'Unlock workspace',
  relocate_output: 'Move resulting output into place',
  clean: 'Clean temporary files',
};

function describeFailure(failure: EngineFailure): string {
  switch (failure.kind) {
    case 'exit_code':
      return `exit status ${failure.code}`;
    case 'signal':
      return `killed by ${failure.signal}`;
    case 'spawn_failed':
      return `could not start: ${failure.reason}`;
  }
}

export const Err = {
  usage: (message: string): UsageError => ({
    _tag: 'UsageError',
    message,
  }),

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  io: (operation: IoOperation, path: string, detail: string): IoError => ({
    _tag: 'IoError',
    operation,
    path,
    message: `${IO_VERBS[operation]} (${path}): ${detail}`,
  }),

  workspaceBusy: (lockPath: string): WorkspaceBusyError => ({
    _tag: 'WorkspaceBusy',
    lockPath,
    message: `Another texloop run holds the workspace lock: ${lockPath}`,
  }),

  compileFailed: (engine: string, attempt: number, failure: EngineFailure, output: string): CompileError => ({
    _tag: 'CompileError',
    engine,
    attempt,
    failure,
    output,
    message: `Compilation error: ${engine} ${describeFailure(failure)} (pass ${attempt + 1})`,
  }),

  interrupted: (attempt: number): InterruptedError => ({
    _tag: 'Interrupted',
    attempt,
    message: `Interrupted during pass ${attempt + 1}; temporary files were left in place`,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;

export function convergenceWarning(attempts: number): ConvergenceWarning {
  return {
    _tag: 'ConvergenceWarning',
    attempts,
    message: `${attempts} compilations were maybe insufficient: auxiliary files were still changing`,
  };
}
