/**
 * What a command hands back to the entrypoint. Commands never print or exit;
 * the interpreter does both from this value.
 */

import type { ExitCode } from './exit-code.js';

export interface CliOutput {
  /** One-line headline. */
  readonly message: string;
  /** Extra lines shown under the headline (usage text, config issues). */
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
  /** Raw engine transcript, reproduced verbatim on stdout ahead of everything else. */
  readonly transcript?: string;
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export type FailureOptions = Omit<CliOutput, 'message'> & { readonly exitCode?: ExitCode };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(message: string, options: FailureOptions = {}): CliResult {
  const { exitCode = { kind: 'general_error' }, ...rest } = options;
  return { kind: 'failure', exitCode, output: { message, ...rest } };
}

/** Bad arguments: the usage text goes in `details`. */
export function misuse(message: string, usage?: readonly string[]): CliResult {
  return failure(message, { exitCode: { kind: 'misuse' }, details: usage });
}
