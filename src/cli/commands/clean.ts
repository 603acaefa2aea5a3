/**
 * Clean Command
 *
 * Removes every workspace under the temporary root.
 * Pure function with dependency injection.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { IoError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';

export interface CleanCommandDeps {
  readonly cleanWorkspaces: () => ResultAsync<{ readonly removed: string }, IoError>;
}

/**
 * Execute the clean command.
 */
export async function executeCleanCommand(deps: CleanCommandDeps): Promise<CliResult> {
  const result = await deps.cleanWorkspaces();

  return result.match(
    ({ removed }) => success({ message: `Removed temporary files: ${removed}` }),
    (error) => failure(formatAppError(error))
  );
}
