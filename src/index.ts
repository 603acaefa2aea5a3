/**
 * Main entry point - exports all public APIs
 */

export { loadConfig, createValidatedConfig, DEFAULT_ENGINE, OUTPUT_FORMATS } from './config/app-config.js';
export type { AppConfig, ValidatedConfig, EngineName, TempRoot, OutputFormat } from './config/app-config.js';

export { Err, formatAppError, convergenceWarning } from './errors/index.js';
export type {
  AppError,
  CompileAppError,
  CompileError,
  ConvergenceWarning,
  InterruptedError,
  IoError,
  UsageError,
  WorkspaceBusyError,
} from './errors/index.js';

export { resolveDocumentIdentity, type DocumentIdentity } from './domain/document-identity.js';
export { WorkspaceResolver, workspaceFor, type Workspace } from './domain/workspace-resolver.js';
export { ConvergenceTracker, type ArtifactTracker } from './domain/convergence-tracker.js';
export {
  driveToFixedPoint,
  COMPILE_CEILING,
  type DriveOutcome,
  type DriverState,
  type DriverTransition,
} from './domain/compilation-driver.js';
export { relocateOutput, relocationFor, type Relocation } from './domain/result-finalizer.js';
export { Fnv1a64, fnv1a64 } from './domain/fnv1a64.js';

export {
  createCompileDocumentUseCase,
  engineArgsFor,
  type CompileDocument,
  type CompileOptions,
  type CompileReport,
  type CompileRequest,
} from './application/compile-document.js';
export { createCleanWorkspacesUseCase, type CleanWorkspaces } from './application/clean-workspaces.js';

export { NodeFileSystem } from './infra/local/fs/index.js';
export { StreamingContentHasher } from './infra/local/content-hash/index.js';
export { ChildProcessEngineRunner } from './infra/local/engine-runner/index.js';
export { LocalWorkspaceLock, lockPathFor } from './infra/local/workspace-lock/index.js';

export type { CliResult, CliOutput, ExitCode } from './cli/types/index.js';
export { parseInvocation, type Invocation } from './cli/parse-invocation.js';
export { runCli, VERSION, type CliEnvironment } from './cli/run-cli.js';
