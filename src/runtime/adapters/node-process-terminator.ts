import type { ProcessTerminator, Termination } from '../ports/process-terminator.js';

const EXIT_STATUS: Record<Termination['kind'], number> = {
  success: 0,
  failure: 1,
};

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(termination: Termination): never {
    return process.exit(EXIT_STATUS[termination.kind]);
  }
}
