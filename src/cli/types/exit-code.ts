import type { Termination } from '../../runtime/ports/process-terminator.js';

/**
 * Why a command ended. Kept apart from the numeric status: misuse and every
 * other failure both exit 1, since callers (editors, make) only tell
 * "built" from "not built".
 */
export type ExitCode =
  | { readonly kind: 'success' }        // output produced (converged or ceiling reached)
  | { readonly kind: 'general_error' }  // io / compile / config / busy
  | { readonly kind: 'misuse' };        // bad arguments

export function toTermination(exitCode: ExitCode): Termination {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
    case 'misuse':
      return { kind: 'failure' };
  }
}
