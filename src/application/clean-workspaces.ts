import type { ResultAsync } from 'neverthrow';
import type { TempRoot } from '../config/app-config.js';
import type { IoError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { Logger } from '../core/logging/types.js';
import type { DirectoryOpsPort } from '../ports/fs.port.js';

export interface CleanWorkspacesDeps {
  readonly tempRoot: TempRoot;
  readonly fs: DirectoryOpsPort;
  readonly logger: Logger;
}

export type CleanWorkspaces = () => ResultAsync<{ readonly removed: string }, IoError>;

/**
 * Remove every workspace (and any leftover lock) by deleting the temporary root.
 * A root that does not exist counts as clean.
 */
export function createCleanWorkspacesUseCase(deps: CleanWorkspacesDeps): CleanWorkspaces {
  return function cleanWorkspaces() {
    deps.logger.debug({ tempRoot: deps.tempRoot }, 'Removing temporary root');
    return deps.fs
      .removeTree(deps.tempRoot)
      .mapErr((e) => Err.io('clean', deps.tempRoot, e.message))
      .map(() => ({ removed: deps.tempRoot }));
  };
}
