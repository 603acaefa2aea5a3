import type { ResultAsync } from 'neverthrow';

export interface EngineInvocation {
  readonly engine: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Aborting kills the engine with SIGTERM; the run then resolves as `signaled`. */
  readonly signal?: AbortSignal;
}

export type EngineExit =
  | { readonly kind: 'exited'; readonly code: number }
  | { readonly kind: 'signaled'; readonly signal: string };

export interface EngineRun {
  readonly exit: EngineExit;
  /** stdout and stderr interleaved in arrival order. */
  readonly output: string;
}

export type EngineRunError = {
  readonly code: 'ENGINE_SPAWN_FAILED';
  readonly engine: string;
  readonly message: string;
};

/**
 * Port: run the document engine once and wait for it.
 *
 * - No timeout: a hung engine hangs the run until `signal` is aborted
 * - A non-zero exit is a successful *run* (reported in `exit`); only a failure
 *   to start the process is an error
 */
export interface EngineRunnerPort {
  run(invocation: EngineInvocation): ResultAsync<EngineRun, EngineRunError>;
}
