import type { ProcessTerminator, Termination } from '../ports/process-terminator.js';

/**
 * Thrown instead of exiting, so CLI tests can assert on the requested termination.
 */
export class TerminationRequested extends Error {
  constructor(readonly termination: Termination) {
    super(`process termination requested (${termination.kind})`);
    this.name = 'TerminationRequested';
  }
}

/**
 * Test adapter: never exits the process.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(termination: Termination): never {
    throw new TerminationRequested(termination);
  }
}
