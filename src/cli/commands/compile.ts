/**
 * Compile Command
 *
 * Compiles a document to a fixed point and reports where the output went.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import { formatAppError } from '../../errors/formatter.js';
import type { CompileDocument, CompileRequest } from '../../application/compile-document.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CompileCommandDeps {
  readonly compileDocument: CompileDocument;
  /** Aborted by SIGINT/SIGTERM/SIGHUP in the composition root. */
  readonly signal?: AbortSignal;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Execute the compile command.
 */
export async function executeCompileCommand(
  request: CompileRequest,
  deps: CompileCommandDeps
): Promise<CliResult> {
  const result = await deps.compileDocument(request, { signal: deps.signal });

  if (result.isOk()) {
    const report = result.value;
    const passes = `${report.attempts} pass${report.attempts === 1 ? '' : 'es'}`;
    return success({
      message: `Wrote ${report.outputPath} (${passes})`,
      warnings: report.warning ? [report.warning.message] : undefined,
    });
  }

  const error = result.error;
  switch (error._tag) {
    case 'CompileError':
      return failure(formatAppError(error), {
        transcript: error.output || undefined,
        suggestions:
          error.failure.kind === 'spawn_failed'
            ? [`Check that "${error.engine}" is installed, or point TEX at another engine`]
            : undefined,
      });

    case 'Interrupted':
      return failure(formatAppError(error), {
        suggestions: ['Run the same command again to resume from the kept auxiliary files'],
      });

    case 'WorkspaceBusy':
      return failure(formatAppError(error), {
        suggestions: [
          'Wait for the other run on this document to finish',
          'If no other run is active, remove the stale lock with: texloop -clean',
        ],
      });

    case 'IoError':
      return failure(formatAppError(error), {
        suggestions:
          error.operation === 'relocate_output'
            ? ['The workspace is left in place; inspect it or rerun after fixing the destination']
            : undefined,
      });

    default:
      return assertNever(error);
  }
}
