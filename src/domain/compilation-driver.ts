import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { EngineRunnerPort } from '../ports/engine-runner.port.js';
import type { CompileError, ConvergenceWarning, InterruptedError, IoError } from '../errors/app-error.js';
import { Err, convergenceWarning } from '../errors/factories.js';
import type { Logger } from '../core/logging/types.js';
import type { ArtifactTracker } from './convergence-tracker.js';

/** Maximum engine runs per invocation. */
export const COMPILE_CEILING = 5;

export type DriverState =
  | 'idle'
  | 'compiling'
  | 'snapshotting'
  | 'converged'
  | 'ceiling_reached'
  | 'failed'
  | 'interrupted';

export interface DriverTransition {
  readonly from: DriverState;
  readonly to: DriverState;
  readonly attempt: number;
}

export type DriveOutcome =
  | { readonly kind: 'converged'; readonly attempts: number }
  | { readonly kind: 'ceiling_reached'; readonly attempts: number; readonly warning: ConvergenceWarning };

export type DriveError = CompileError | IoError | InterruptedError;

export interface DriveRequest {
  readonly engine: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly signal?: AbortSignal;
}

export interface CompilationDriverDeps {
  readonly runner: EngineRunnerPort;
  readonly logger: Logger;
  /** Observes every state change; terminal states are reported once. */
  readonly onTransition?: (transition: DriverTransition) => void;
}

/**
 * Run the engine until the tracker stops reporting changes or the ceiling is hit.
 *
 * - Only a successful run is followed by another; a failing run ends everything
 * - Reaching the ceiling is not an error: the outcome carries a warning and the
 *   caller still relocates the output
 * - Once `signal` is aborted no further run starts, and the run it cut short
 *   ends as `Interrupted` rather than as a compile failure
 */
export function driveToFixedPoint(
  request: DriveRequest,
  tracker: ArtifactTracker,
  deps: CompilationDriverDeps,
  ceiling: number = COMPILE_CEILING
): ResultAsync<DriveOutcome, DriveError> {
  let state: DriverState = 'idle';
  const enter = (to: DriverState, attempt: number): void => {
    deps.onTransition?.({ from: state, to, attempt });
    state = to;
  };

  const interrupted = (attempt: number): ResultAsync<DriveOutcome, DriveError> => {
    enter('interrupted', attempt);
    deps.logger.warn({ attempt }, 'Compilation interrupted');
    return errAsync(Err.interrupted(attempt));
  };

  const step = (attempt: number): ResultAsync<DriveOutcome, DriveError> => {
    if (request.signal?.aborted) return interrupted(attempt);

    if (!tracker.changed()) {
      enter('converged', attempt);
      return okAsync<DriveOutcome, DriveError>({ kind: 'converged', attempts: attempt });
    }

    if (attempt >= ceiling) {
      enter('ceiling_reached', attempt);
      const warning = convergenceWarning(attempt);
      deps.logger.warn({ attempts: attempt }, warning.message);
      return okAsync<DriveOutcome, DriveError>({ kind: 'ceiling_reached', attempts: attempt, warning });
    }

    enter('compiling', attempt);
    deps.logger.debug({ attempt, engine: request.engine, args: request.args }, 'Compile iteration');

    return deps.runner
      .run(request)
      .mapErr((e): DriveError => {
        enter('failed', attempt);
        return Err.compileFailed(request.engine, attempt, { kind: 'spawn_failed', reason: e.message }, '');
      })
      .andThen((run): ResultAsync<DriveOutcome, DriveError> => {
        if (request.signal?.aborted) return interrupted(attempt);

        if (run.exit.kind === 'signaled' || run.exit.code !== 0) {
          enter('failed', attempt);
          const failure =
            run.exit.kind === 'signaled'
              ? { kind: 'signal' as const, signal: run.exit.signal }
              : { kind: 'exit_code' as const, code: run.exit.code };
          return errAsync(Err.compileFailed(request.engine, attempt, failure, run.output));
        }

        enter('snapshotting', attempt);
        deps.logger.debug({ attempt }, 'Updating hashes');
        return tracker.update().andThen(() => step(attempt + 1));
      });
  };

  return step(0);
}
