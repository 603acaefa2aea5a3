import { ResultAsync, err, type Result } from 'neverthrow';
import type { OutputFormat } from '../config/app-config.js';
import type { CompileAppError, ConvergenceWarning } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { Logger } from '../core/logging/types.js';
import type { ContentHashPort } from '../ports/content-hash.port.js';
import type { EngineRunnerPort } from '../ports/engine-runner.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { WorkspaceLockError, WorkspaceLockHandle, WorkspaceLockPort } from '../ports/workspace-lock.port.js';
import { resolveDocumentIdentity, type DocumentIdentity } from '../domain/document-identity.js';
import { WorkspaceResolver, type Workspace } from '../domain/workspace-resolver.js';
import { ConvergenceTracker, LOG_EXTENSION } from '../domain/convergence-tracker.js';
import { driveToFixedPoint, type DriverTransition } from '../domain/compilation-driver.js';
import { relocateOutput } from '../domain/result-finalizer.js';

/** Reserved: the workspace directory is always injected as the output directory. */
export const OUTPUT_DIRECTORY_FLAG = '-output-directory';

export interface CompileRequest {
  /** Engine options passed through untouched, in order. */
  readonly engineOptions: readonly string[];
  /** Document path as typed by the user. */
  readonly document: string;
}

export interface CompileReport {
  readonly outcome: 'converged' | 'ceiling_reached';
  readonly attempts: number;
  readonly outputPath: string;
  readonly warning?: ConvergenceWarning;
}

export interface CompileDocumentDeps {
  readonly engine: string;
  readonly cwd: string;
  readonly outputFormat: OutputFormat;
  readonly resolver: WorkspaceResolver;
  readonly fs: FileSystemPort;
  readonly hasher: ContentHashPort;
  readonly runner: EngineRunnerPort;
  readonly lock: WorkspaceLockPort;
  readonly logger: Logger;
  readonly ceiling?: number;
  readonly onTransition?: (transition: DriverTransition) => void;
}

export interface CompileOptions {
  /** Stops the loop and kills a running engine; the lock is still released. */
  readonly signal?: AbortSignal;
}

export type CompileDocument = (
  request: CompileRequest,
  options?: CompileOptions
) => ResultAsync<CompileReport, CompileAppError>;

/**
 * Engine argument list: injected output directory first, document last.
 */
export function engineArgsFor(request: CompileRequest, workspace: Workspace): readonly string[] {
  return [OUTPUT_DIRECTORY_FLAG, workspace.directory, ...request.engineOptions, request.document];
}

export function createCompileDocumentUseCase(deps: CompileDocumentDeps): CompileDocument {
  const log = deps.logger;

  const observe = (transition: DriverTransition): void => {
    log.trace(transition, 'Driver transition');
    deps.onTransition?.(transition);
  };

  const underLock = (
    identity: DocumentIdentity,
    workspace: Workspace,
    request: CompileRequest,
    signal: AbortSignal | undefined
  ): ResultAsync<CompileReport, CompileAppError> =>
    ConvergenceTracker.create(
      workspace,
      { excludedExtensions: [deps.outputFormat, LOG_EXTENSION] },
      { fs: deps.fs, hasher: deps.hasher, logger: log }
    )
      .andThen((tracker) =>
        driveToFixedPoint(
          { engine: deps.engine, args: engineArgsFor(request, workspace), cwd: deps.cwd, signal },
          tracker,
          { runner: deps.runner, logger: log, onTransition: observe },
          deps.ceiling
        )
      )
      .andThen((outcome) =>
        relocateOutput(deps.fs, workspace, identity, deps.outputFormat).map((relocation): CompileReport => {
          log.debug({ from: relocation.from, to: relocation.to }, 'Moved output into place');
          return {
            outcome: outcome.kind,
            attempts: outcome.attempts,
            outputPath: relocation.to,
            warning: outcome.kind === 'ceiling_reached' ? outcome.warning : undefined,
          };
        })
      );

  const releasing = <T>(
    handle: WorkspaceLockHandle,
    work: () => ResultAsync<T, CompileAppError>
  ): ResultAsync<T, CompileAppError> =>
    new ResultAsync(
      (async (): Promise<Result<T, CompileAppError>> => {
        let outcome: Result<T, CompileAppError>;
        let released: Result<void, WorkspaceLockError>;
        try {
          outcome = await work();
        } finally {
          released = await deps.lock.release(handle);
          log.debug({ lockPath: handle.lockPath, released: released.isOk() }, 'Released workspace lock');
        }
        // The run's own error wins over a failed release.
        if (released.isErr() && outcome.isOk()) {
          return err(Err.io('unlock_workspace', handle.lockPath, released.error.message));
        }
        return outcome;
      })()
    );

  return function compileDocument(request, options = {}) {
    const identity = resolveDocumentIdentity(request.document, deps.cwd);

    return deps.resolver
      .resolve(identity)
      .andThen((workspace) => {
        log.debug({ workspace: workspace.directory, base: workspace.base }, 'Resolved workspace');
        return deps.lock
          .acquire(workspace)
          .mapErr((e): CompileAppError =>
            e.code === 'WORKSPACE_LOCK_BUSY'
              ? Err.workspaceBusy(e.lockPath)
              : Err.io('lock_workspace', e.lockPath, e.message)
          )
          .andThen((handle) => {
            log.debug({ lockPath: handle.lockPath }, 'Acquired workspace lock');
            return releasing(handle, () => underLock(identity, workspace, request, options.signal));
          });
      });
  };
}
