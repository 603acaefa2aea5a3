import type { Logger } from '../core/logging/types.js';
import type { InterruptSignal, ProcessSignals } from '../runtime/ports/process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';

export const INTERRUPT_SIGNALS: readonly InterruptSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Turn process signals into an AbortSignal for the running compile.
 *
 * The first signal aborts: the engine is killed, the loop stops and the
 * workspace lock is released before the CLI exits. A second signal while that
 * is still in progress terminates right away.
 */
export function listenForInterrupts(
  signals: ProcessSignals,
  terminator: ProcessTerminator,
  logger: Logger
): AbortSignal {
  const controller = new AbortController();

  for (const name of INTERRUPT_SIGNALS) {
    signals.on(name, () => {
      if (controller.signal.aborted) {
        logger.warn({ signal: name }, 'Second interrupt, exiting without cleanup');
        return terminator.terminate({ kind: 'failure' });
      }
      logger.info({ signal: name }, 'Interrupt received, stopping the engine');
      controller.abort(name);
    });
  }

  return controller.signal;
}
