export type {
  AppError,
  CompileAppError,
  CompileError,
  ConfigIssue,
  ConfigInvalidError,
  ConvergenceWarning,
  EngineFailure,
  InterruptedError,
  IoError,
  IoOperation,
  UnexpectedError,
  UsageError,
  ValidatedAppConfig,
  WorkspaceBusyError,
} from './app-error.js';
export { Err, convergenceWarning } from './factories.js';
export { formatAppError } from './formatter.js';
