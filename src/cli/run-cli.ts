/**
 * Command wiring: argv in, CliResult out.
 *
 * Kept apart from the entry point so tests can drive commander with a real
 * container and a scripted engine, without a process exit at the end.
 */

import { Command } from 'commander';

import { initializeContainer, container } from '../di/container.js';
import { DI } from '../di/tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import type { CompileDocument } from '../application/compile-document.js';
import type { CleanWorkspaces } from '../application/clean-workspaces.js';
import { formatAppError } from '../errors/formatter.js';
import { assertNever } from '../runtime/assert-never.js';

import { parseInvocation, USAGE_LINES } from './parse-invocation.js';
import { listenForInterrupts } from './interrupts.js';
import { failure, misuse, type CliResult } from './types/index.js';
import { executeCompileCommand, executeCleanCommand } from './commands/index.js';

export const VERSION = '0.1.0';

export interface CliEnvironment {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  readonly tmpdir: string;
  /** Detected from `env` when absent. */
  readonly runtimeMode?: RuntimeMode;
}

async function dispatch(args: readonly string[], environment: CliEnvironment): Promise<CliResult> {
  const invocation = parseInvocation(args);
  if (invocation.isErr()) return misuse(invocation.error.message, USAGE_LINES);

  const init = initializeContainer({
    runtimeMode: environment.runtimeMode,
    env: environment.env,
    cwd: environment.cwd,
    tmpdir: environment.tmpdir,
  });
  if (init.isErr()) return failure(formatAppError(init.error));

  const request = invocation.value;
  switch (request.kind) {
    case 'clean':
      return executeCleanCommand({
        cleanWorkspaces: container.resolve<CleanWorkspaces>(DI.UseCases.CleanWorkspaces),
      });

    case 'compile': {
      const signal = listenForInterrupts(
        container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals),
        container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
        container.resolve<ILoggerFactory>(DI.Infra.LoggerFactory).create('signals')
      );
      return executeCompileCommand(request, {
        compileDocument: container.resolve<CompileDocument>(DI.UseCases.CompileDocument),
        signal,
      });
    }

    default:
      return assertNever(request);
  }
}

/**
 * Parse `args` (without the node and script entries) and run the command.
 * Only `--help` and `--version` end the process from inside commander.
 */
export async function runCli(args: readonly string[], environment: CliEnvironment): Promise<CliResult> {
  let outcome: CliResult = misuse('No command ran', USAGE_LINES);

  // Engine options are single-dash words (-halt-on-error, -interaction=...), so
  // help and version only answer to their long forms and everything else passes through.
  const program = new Command()
    .name('texloop')
    .description('Compile a TeX document until its auxiliary files stop changing')
    .usage('[tex options] file.tex\n       texloop -clean')
    .version(VERSION, '--version', 'output the version number')
    .helpOption('--help', 'display help for command')
    .argument('[args...]', 'engine options followed by the document')
    .allowUnknownOption()
    .allowExcessArguments()
    .action(async (commandArgs: string[]) => {
      outcome = await dispatch(commandArgs, environment);
    });

  await program.parseAsync([...args], { from: 'user' });
  return outcome;
}
