import type { ResultAsync } from 'neverthrow';
import type { Workspace } from '../domain/workspace-resolver.js';

export type WorkspaceLockError =
  | { readonly code: 'WORKSPACE_LOCK_BUSY'; readonly message: string; readonly lockPath: string }
  | { readonly code: 'WORKSPACE_LOCK_IO_ERROR'; readonly message: string; readonly lockPath: string };

export interface WorkspaceLockHandle {
  readonly kind: 'workspace_lock_handle';
  readonly lockPath: string;
}

/**
 * Port: per-document exclusive lock on a workspace.
 *
 * Invariants:
 * - One compile loop per document identity at a time, across processes
 * - acquire() fails immediately if busy (no blocking)
 * - A lock whose recorded owner pid no longer exists is stale and is replaced
 * - release() required after acquire, on every exit path
 *
 * Example:
 * ```typescript
 * const handle = await lock.acquire(workspace);
 * try {
 *   // snapshot, compile, relocate
 * } finally {
 *   await lock.release(handle);
 * }
 * ```
 */
export interface WorkspaceLockPort {
  acquire(workspace: Workspace): ResultAsync<WorkspaceLockHandle, WorkspaceLockError>;
  release(handle: WorkspaceLockHandle): ResultAsync<void, WorkspaceLockError>;
}
