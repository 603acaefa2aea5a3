import type { InterruptSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Test mode: never install process-wide handlers inside the test runner.
 */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: InterruptSignal, _handler: () => void): void {
    // no-op
  }
}
