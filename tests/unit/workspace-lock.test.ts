import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Workspace } from '../../src/domain/workspace-resolver.js';
import { LocalWorkspaceLock, lockPathFor } from '../../src/infra/local/workspace-lock/index.js';
import { NodeFileSystem } from '../../src/infra/local/fs/index.js';
import { FakeTimeClock } from '../fakes/time-clock.fake.js';
import { exists, makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

describe('LocalWorkspaceLock', () => {
  let dir: string;
  let workspace: Workspace;
  let lock: LocalWorkspaceLock;
  let clock: FakeTimeClock;

  beforeEach(async () => {
    dir = await makeTempDir('lock');
    workspace = { base: path.join(dir, 'paper'), directory: dir, baseName: 'paper' };
    clock = new FakeTimeClock();
    lock = new LocalWorkspaceLock(new NodeFileSystem(), clock);
  });

  const leaveLock = (content: string): Promise<void> => fs.writeFile(lockPathFor(workspace), content);

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('names the lock file after the document, hidden beside its artifacts', () => {
    expect(lockPathFor(workspace)).toBe(path.join(dir, '.paper.texloop.lock'));
  });

  it('writes owner metadata into the lock file', async () => {
    const handle = (await lock.acquire(workspace))._unsafeUnwrap();

    expect(handle).toEqual({ kind: 'workspace_lock_handle', lockPath: lockPathFor(workspace) });
    expect(JSON.parse(await fs.readFile(handle.lockPath, 'utf8'))).toEqual({
      v: 1,
      document: workspace.base,
      pid: 12345,
      startedAtMs: 1000000000000,
    });
  });

  it('fails fast while another holder has the lock', async () => {
    (await lock.acquire(workspace))._unsafeUnwrap();

    const error = (await lock.acquire(workspace))._unsafeUnwrapErr();

    expect(error.code).toBe('WORKSPACE_LOCK_BUSY');
    expect(error.lockPath).toBe(lockPathFor(workspace));
  });

  it('replaces a lock left by a process that no longer exists', async () => {
    await leaveLock(JSON.stringify({ v: 1, document: workspace.base, pid: 999, startedAtMs: 1 }));
    clock.markDead(999);

    const handle = (await lock.acquire(workspace))._unsafeUnwrap();

    expect(JSON.parse(await fs.readFile(handle.lockPath, 'utf8'))).toEqual({
      v: 1,
      document: workspace.base,
      pid: 12345,
      startedAtMs: 1000000000000,
    });
  });

  it('keeps a lock whose owner is still running', async () => {
    const content = JSON.stringify({ v: 1, document: workspace.base, pid: 4242, startedAtMs: 1 });
    await leaveLock(content);

    expect((await lock.acquire(workspace))._unsafeUnwrapErr().code).toBe('WORKSPACE_LOCK_BUSY');
    expect(await fs.readFile(lockPathFor(workspace), 'utf8')).toBe(content);
  });

  it('treats a lock file it cannot read as held', async () => {
    clock.markDead(999);
    await leaveLock('{"v":1,"pid":');

    expect((await lock.acquire(workspace))._unsafeUnwrapErr().code).toBe('WORKSPACE_LOCK_BUSY');

    await leaveLock(JSON.stringify({ v: 2, pid: 999 }));
    expect((await lock.acquire(workspace))._unsafeUnwrapErr().code).toBe('WORKSPACE_LOCK_BUSY');
  });

  it('can be taken again after release', async () => {
    const handle = (await lock.acquire(workspace))._unsafeUnwrap();
    expect((await lock.release(handle)).isOk()).toBe(true);
    expect(await exists(handle.lockPath)).toBe(false);

    expect((await lock.acquire(workspace)).isOk()).toBe(true);
  });

  it('reports an I/O error when the workspace directory is missing', async () => {
    const missing = { ...workspace, directory: path.join(dir, 'missing') };

    const error = (await lock.acquire(missing))._unsafeUnwrapErr();

    expect(error.code).toBe('WORKSPACE_LOCK_IO_ERROR');
  });

  it('reports an I/O error when releasing a lock that is gone', async () => {
    const handle = (await lock.acquire(workspace))._unsafeUnwrap();
    await fs.unlink(handle.lockPath);

    expect((await lock.release(handle))._unsafeUnwrapErr().code).toBe('WORKSPACE_LOCK_IO_ERROR');
  });
});
