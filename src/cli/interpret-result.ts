import type { CliResult } from './types/cli-result.js';
import { toTermination } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Print a command's result, then end the process on failure.
 *
 * The single place where a CliResult turns into process termination. A
 * successful run is left to exit on its own so buffered output drains.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  if (result.kind === 'failure') {
    terminator.terminate(toTermination(result.exitCode));
  }
}
