import type { InterruptSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Registering a handler replaces Node's default "die immediately" behavior.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: InterruptSignal, handler: () => void): void {
    process.on(signal, () => handler());
  }
}
