import * as path from 'path';
import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import { z } from 'zod';
import type { FileManipulationPort, FsError } from '../../../ports/fs.port.js';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import type { Workspace } from '../../../domain/workspace-resolver.js';
import type {
  WorkspaceLockError,
  WorkspaceLockHandle,
  WorkspaceLockPort,
} from '../../../ports/workspace-lock.port.js';

/**
 * Lock file beside the artifacts. The leading dot keeps it out of the
 * `<baseName>.*` set the convergence tracker hashes.
 */
export function lockPathFor(workspace: Workspace): string {
  return path.join(workspace.directory, `.${workspace.baseName}.texloop.lock`);
}

const LockFileSchema = z.object({
  v: z.literal(1),
  pid: z.number().int().positive(),
});

/**
 * Local, per-document single-run lock.
 *
 * - fail fast if the lock file exists and its owner is running (or unknown)
 * - a lock left by a process that no longer exists is removed and retaken once
 * - `texloop -clean` still removes any leftover
 */
export class LocalWorkspaceLock implements WorkspaceLockPort {
  constructor(
    private readonly fs: FileManipulationPort,
    private readonly clock: TimeClockPort
  ) {}

  acquire(workspace: Workspace): ResultAsync<WorkspaceLockHandle, WorkspaceLockError> {
    const lockPath = lockPathFor(workspace);
    const handle: WorkspaceLockHandle = { kind: 'workspace_lock_handle', lockPath };

    const busy: WorkspaceLockError = {
      code: 'WORKSPACE_LOCK_BUSY',
      message: `Workspace is locked by another process: ${lockPath}`,
      lockPath,
    };
    const ioError = (e: FsError): WorkspaceLockError => ({ code: 'WORKSPACE_LOCK_IO_ERROR', message: e.message, lockPath });
    const mapFs = (e: FsError): WorkspaceLockError => (e.code === 'FS_ALREADY_EXISTS' ? busy : ioError(e));

    const write = (): ResultAsync<WorkspaceLockHandle, FsError> => {
      const body = JSON.stringify({
        v: 1,
        document: workspace.base,
        pid: this.clock.getPid(),
        startedAtMs: this.clock.nowMs(),
      });
      return this.fs.writeExclusive(lockPath, new TextEncoder().encode(body)).map(() => handle);
    };

    return write().orElse((e): ResultAsync<WorkspaceLockHandle, WorkspaceLockError> => {
      if (e.code !== 'FS_ALREADY_EXISTS') return errAsync(ioError(e));

      return this.isStale(lockPath)
        .mapErr(ioError)
        .andThen((stale): ResultAsync<WorkspaceLockHandle, WorkspaceLockError> => {
          if (!stale) return errAsync(busy);
          return this.fs
            .unlink(lockPath)
            .orElse((u) => (u.code === 'FS_NOT_FOUND' ? okAsync(undefined) : errAsync(u)))
            .andThen(write)
            .mapErr(mapFs);
        });
    });
  }

  release(handle: WorkspaceLockHandle): ResultAsync<void, WorkspaceLockError> {
    return this.fs.unlink(handle.lockPath).mapErr((e): WorkspaceLockError => ({
      code: 'WORKSPACE_LOCK_IO_ERROR',
      message: e.message,
      lockPath: handle.lockPath,
    }));
  }

  /**
   * Stale only when the file names a pid that is gone. Unreadable or foreign
   * content counts as held.
   */
  private isStale(lockPath: string): ResultAsync<boolean, FsError> {
    return this.fs
      .readUtf8(lockPath)
      .map((text) => {
        const parsed = LockFileSchema.safeParse(parseJson(text));
        return parsed.success && !this.clock.isProcessAlive(parsed.data.pid);
      })
      // Removed between our write and read: treat as free.
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(true) : errAsync(e)));
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Torn or foreign content; the schema rejects undefined.
    return undefined;
  }
}
