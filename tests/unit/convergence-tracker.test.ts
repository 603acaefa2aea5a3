import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConvergenceTracker } from '../../src/domain/convergence-tracker.js';
import type { Workspace } from '../../src/domain/workspace-resolver.js';
import { fnv1a64 } from '../../src/domain/fnv1a64.js';
import { NodeFileSystem } from '../../src/infra/local/fs/index.js';
import { StreamingContentHasher } from '../../src/infra/local/content-hash/index.js';
import { createSilentLogger } from '../../src/core/logging/index.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

describe('ConvergenceTracker', () => {
  let dir: string;
  let workspace: Workspace;

  const deps = () => ({ fs: new NodeFileSystem(), hasher: new StreamingContentHasher(), logger: createSilentLogger() });
  const create = () => ConvergenceTracker.create(workspace, { excludedExtensions: ['pdf', 'log'] }, deps());
  const write = (name: string, content: string) => fs.writeFile(path.join(dir, name), content);

  beforeEach(async () => {
    dir = await makeTempDir('tracker');
    workspace = { base: path.join(dir, 'doc'), directory: dir, baseName: 'doc' };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('reports changed right after construction, even with nothing to track', async () => {
    const tracker = (await create())._unsafeUnwrap();

    expect(tracker.changed()).toBe(true);
    expect(tracker.snapshot().size).toBe(0);
  });

  it('reports changed after construction when a previous run left artifacts', async () => {
    await write('doc.aux', 'a');

    const tracker = (await create())._unsafeUnwrap();

    expect(tracker.changed()).toBe(true);
    expect(tracker.snapshot().get(path.join(dir, 'doc.aux'))).toBe('af63dc4c8601ec8c');
  });

  it('reports no change when nothing was rewritten', async () => {
    await write('doc.aux', 'a');
    const tracker = (await create())._unsafeUnwrap();

    expect((await tracker.update())._unsafeUnwrap()).toBe(false);
    expect(tracker.changed()).toBe(false);
  });

  it('reports a change when a tracked file is rewritten with new content', async () => {
    await write('doc.aux', 'a');
    const tracker = (await create())._unsafeUnwrap();

    await write('doc.aux', 'b');
    expect((await tracker.update())._unsafeUnwrap()).toBe(true);
    expect(tracker.snapshot().get(path.join(dir, 'doc.aux'))).toBe(fnv1a64(new TextEncoder().encode('b')));

    expect((await tracker.update())._unsafeUnwrap()).toBe(false);
  });

  it('reports no change when a file is rewritten with identical content', async () => {
    await write('doc.toc', 'same');
    const tracker = (await create())._unsafeUnwrap();

    await write('doc.toc', 'same');
    expect((await tracker.update())._unsafeUnwrap()).toBe(false);
  });

  it('reports a change when a new tracked file appears', async () => {
    await write('doc.aux', 'a');
    const tracker = (await create())._unsafeUnwrap();
    await tracker.update();

    await write('doc.toc', 'contents');
    expect((await tracker.update())._unsafeUnwrap()).toBe(true);
    expect([...tracker.snapshot().keys()].sort()).toEqual([path.join(dir, 'doc.aux'), path.join(dir, 'doc.toc')]);
  });

  it('ignores the output file, the log and other documents', async () => {
    const tracker = (await create())._unsafeUnwrap();

    await write('doc.pdf', 'output');
    await write('doc.log', 'transcript');
    await write('other.aux', 'x');
    await write('.doc.texloop.lock', '{}');
    await fs.mkdir(path.join(dir, 'doc.d'));

    expect((await tracker.update())._unsafeUnwrap()).toBe(false);
    expect(tracker.snapshot().size).toBe(0);
  });

  it('keeps the last hash of a file that disappears', async () => {
    await write('doc.aux', 'a');
    const tracker = (await create())._unsafeUnwrap();

    await fs.unlink(path.join(dir, 'doc.aux'));

    expect((await tracker.update())._unsafeUnwrap()).toBe(false);
    expect(tracker.snapshot().get(path.join(dir, 'doc.aux'))).toBe('af63dc4c8601ec8c');
  });

  it('selects <baseName>.<ext> names whose final extension is not excluded', async () => {
    const tracker = (await create())._unsafeUnwrap();

    expect(tracker.isTracked('doc.aux')).toBe(true);
    expect(tracker.isTracked('doc.synctex.gz')).toBe(true);
    expect(tracker.isTracked('doc.pdf')).toBe(false);
    expect(tracker.isTracked('doc.tar.log')).toBe(false);
    expect(tracker.isTracked('doc.')).toBe(false);
    expect(tracker.isTracked('docx.aux')).toBe(false);
    expect(tracker.isTracked('other.aux')).toBe(false);
    expect(tracker.isTracked('.doc.texloop.lock')).toBe(false);
  });

  it('fails with IoError when the workspace cannot be listed', async () => {
    const missing = path.join(dir, 'missing');
    workspace = { base: path.join(missing, 'doc'), directory: missing, baseName: 'doc' };

    const error = (await create())._unsafeUnwrapErr();

    expect(error._tag).toBe('IoError');
    expect(error.operation).toBe('list_artifacts');
    expect(error.path).toBe(missing);
  });
});
