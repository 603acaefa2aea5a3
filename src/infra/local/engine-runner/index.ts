import { spawn } from 'child_process';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type {
  EngineExit,
  EngineInvocation,
  EngineRun,
  EngineRunError,
  EngineRunnerPort,
} from '../../../ports/engine-runner.port.js';

/**
 * Runs the engine as a child process, without a shell.
 *
 * stdin is closed so an engine that stops to ask for input fails instead of
 * waiting forever. stdout and stderr share one buffer, in arrival order.
 */
export class ChildProcessEngineRunner implements EngineRunnerPort {
  run(invocation: EngineInvocation): ResultAsync<EngineRun, EngineRunError> {
    return RA.fromPromise(
      new Promise<EngineRun>((resolve, reject) => {
        const child = spawn(invocation.engine, [...invocation.args], {
          cwd: invocation.cwd,
          stdio: ['ignore', 'pipe', 'pipe'],
        });

        const chunks: Buffer[] = [];
        child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

        const { signal: abort } = invocation;
        const kill = (): void => {
          child.kill('SIGTERM');
        };
        if (abort?.aborted) kill();
        else abort?.addEventListener('abort', kill, { once: true });

        child.once('error', (e) => {
          abort?.removeEventListener('abort', kill);
          reject(e);
        });
        child.once('close', (code, signal) => {
          abort?.removeEventListener('abort', kill);
          const exit: EngineExit = signal !== null ? { kind: 'signaled', signal } : { kind: 'exited', code: code ?? 0 };
          resolve({ exit, output: Buffer.concat(chunks).toString('utf8') });
        });
      }),
      (e): EngineRunError => ({
        code: 'ENGINE_SPAWN_FAILED',
        engine: invocation.engine,
        message: e instanceof Error ? e.message : String(e),
      })
    );
  }
}
