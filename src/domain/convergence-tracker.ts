import * as path from 'path';
import { okAsync, type ResultAsync } from 'neverthrow';
import type { ContentHash, ContentHashPort } from '../ports/content-hash.port.js';
import type { DirectoryOpsPort } from '../ports/fs.port.js';
import type { IoError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { Logger } from '../core/logging/types.js';
import type { Workspace } from './workspace-resolver.js';

export const LOG_EXTENSION = 'log';

/**
 * What the compilation driver needs from a tracker.
 */
export interface ArtifactTracker {
  /** Flag computed by the most recent update (forced true after construction). */
  changed(): boolean;
  /** Re-hash the tracked artifacts; resolves with the new flag. */
  update(): ResultAsync<boolean, IoError>;
}

export interface ConvergenceTrackerDeps {
  readonly fs: DirectoryOpsPort;
  readonly hasher: ContentHashPort;
  readonly logger: Logger;
}

export interface ConvergenceTrackerOptions {
  /** Final extensions never tracked, without the dot (output format and `log`). */
  readonly excludedExtensions: readonly string[];
}

/**
 * Snapshots the content hashes of a document's auxiliary files.
 *
 * Tracked files are the regular files in the workspace directory named
 * `<baseName>.<anything>`, except those whose final extension is excluded.
 *
 * The hash map only grows: a file that disappears keeps its last hash and is
 * not reported as a change.
 */
export class ConvergenceTracker implements ArtifactTracker {
  private readonly hashes = new Map<string, ContentHash>();
  private modified = false;

  private constructor(
    private readonly workspace: Workspace,
    private readonly options: ConvergenceTrackerOptions,
    private readonly deps: ConvergenceTrackerDeps
  ) {}

  /**
   * Take the initial snapshot, then force `changed()` to true so at least one
   * compilation always runs, whatever a previous run left behind.
   */
  static create(
    workspace: Workspace,
    options: ConvergenceTrackerOptions,
    deps: ConvergenceTrackerDeps
  ): ResultAsync<ConvergenceTracker, IoError> {
    const tracker = new ConvergenceTracker(workspace, options, deps);
    deps.logger.debug({ base: workspace.base }, 'Computing initial hashes');
    return tracker.update().map(() => {
      tracker.modified = true;
      return tracker;
    });
  }

  changed(): boolean {
    return this.modified;
  }

  snapshot(): ReadonlyMap<string, ContentHash> {
    return new Map(this.hashes);
  }

  update(): ResultAsync<boolean, IoError> {
    const dir = this.workspace.directory;

    return this.deps.fs
      .listFiles(dir)
      .mapErr((e) => Err.io('list_artifacts', dir, e.message))
      .andThen((names) => {
        const files = names
          .filter((name) => this.isTracked(name))
          .sort()
          .map((name) => path.join(dir, name));

        // Sequential on purpose: one file open at a time, deterministic log order.
        return files.reduce<ResultAsync<boolean, IoError>>(
          (acc, file) => acc.andThen((changed) => this.rehash(file).map((c) => changed || c)),
          okAsync<boolean, IoError>(false)
        );
      })
      .map((changed) => {
        this.modified = changed;
        return changed;
      });
  }

  isTracked(fileName: string): boolean {
    const prefix = `${this.workspace.baseName}.`;
    if (!fileName.startsWith(prefix) || fileName.length === prefix.length) return false;
    const ext = path.extname(fileName).slice(1);
    return !this.options.excludedExtensions.includes(ext);
  }

  private rehash(file: string): ResultAsync<boolean, IoError> {
    return this.deps.hasher
      .hashFile(file)
      .mapErr((e) => Err.io('hash_artifact', file, e.message))
      .map((hash) => {
        const changed = this.hashes.get(file) !== hash;
        this.hashes.set(file, hash);
        this.deps.logger.debug({ file, hash, changed }, 'Hashed auxiliary file');
        return changed;
      });
  }
}
