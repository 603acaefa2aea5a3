import { ok, err, type Result } from 'neverthrow';
import type { UsageError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { CompileRequest } from '../application/compile-document.js';

export const CLEAN_FLAG = '-clean';

export const USAGE_LINES: readonly string[] = [
  'Usage: texloop [tex options] file.tex',
  '',
  'will compile file.tex as many times as necessary: until all the generated',
  'temporary files don\'t change anymore, with a maximum of 5 compilations.',
  '',
  'Usage: texloop -clean',
  '',
  'will remove all temporary files used by this program.',
];

export type Invocation =
  | { readonly kind: 'clean' }
  | ({ readonly kind: 'compile' } & CompileRequest);

const OUTPUT_DIRECTORY_NAME = 'output-directory';
// `output-comment` and `output-format` share `output-`; one more letter is unambiguous.
const SHORTEST_OUTPUT_DIRECTORY_PREFIX = 'output-d'.length;

/**
 * True for every spelling the engine reads as the output-directory option:
 * one or two dashes, the full name or any unambiguous prefix of it
 * (`-output-dir`), with or without `=value`.
 */
export function isOutputDirectoryOption(arg: string): boolean {
  const match = /^--?([^=]+)/.exec(arg);
  const name = match?.[1];
  if (name === undefined || name.length < SHORTEST_OUTPUT_DIRECTORY_PREFIX) return false;
  return OUTPUT_DIRECTORY_NAME.startsWith(name);
}

/**
 * Split raw arguments into a request. Runs before anything touches the disk.
 *
 * - `-clean` alone selects the clean command
 * - otherwise the last argument is the document, everything before it goes to the engine
 */
export function parseInvocation(args: readonly string[]): Result<Invocation, UsageError> {
  if (args.length === 1 && args[0] === CLEAN_FLAG) {
    return ok<Invocation, UsageError>({ kind: 'clean' });
  }

  const document = args[args.length - 1];
  if (document === undefined) {
    return err(Err.usage('Missing document to compile'));
  }

  const reserved = args.find(isOutputDirectoryOption);
  if (reserved !== undefined) {
    return err(Err.usage(`"${reserved}" flag not allowed: texloop sets the output directory itself`));
  }

  return ok<Invocation, UsageError>({ kind: 'compile', engineOptions: args.slice(0, -1), document });
}
