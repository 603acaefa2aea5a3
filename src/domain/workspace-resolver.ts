import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import type { TempRoot } from '../config/app-config.js';
import type { DirectoryOpsPort } from '../ports/fs.port.js';
import type { IoError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { DocumentIdentity } from './document-identity.js';

/**
 * The isolated directory the engine writes into for one document.
 */
export interface Workspace {
  /** `<tempRoot>/<relativeStem>`: artifacts are `<base>.<ext>`. */
  readonly base: string;
  /** Directory holding the artifacts; passed as the engine's output directory. */
  readonly directory: string;
  readonly baseName: string;
}

/**
 * Pure placement rule. Identical identities give identical paths across runs,
 * which is what lets a later run start from the previous run's artifacts.
 */
export function workspaceFor(
  tempRoot: TempRoot,
  identity: DocumentIdentity,
  pathApi: path.PlatformPath = path
): Workspace {
  const base = pathApi.join(tempRoot, identity.relativeStem);
  return {
    base,
    directory: pathApi.dirname(base),
    baseName: identity.baseName,
  };
}

export class WorkspaceResolver {
  constructor(
    private readonly tempRoot: TempRoot,
    private readonly fs: DirectoryOpsPort
  ) {}

  /**
   * Compute the workspace and create its directory (and parents).
   */
  resolve(identity: DocumentIdentity): ResultAsync<Workspace, IoError> {
    const workspace = workspaceFor(this.tempRoot, identity);
    return this.fs
      .mkdirp(workspace.directory)
      .mapErr((e) => Err.io('create_workspace', workspace.directory, e.message))
      .map(() => workspace);
  }
}
