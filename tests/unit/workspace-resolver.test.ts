import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { okAsync, errAsync } from 'neverthrow';
import type { TempRoot } from '../../src/config/app-config.js';
import { resolveDocumentIdentity } from '../../src/domain/document-identity.js';
import { WorkspaceResolver, workspaceFor } from '../../src/domain/workspace-resolver.js';
import { NodeFileSystem } from '../../src/infra/local/fs/index.js';
import type { DirectoryOpsPort } from '../../src/ports/fs.port.js';
import { makeTempDir, removeTempDir } from '../helpers/temp-dir.js';

const root = (p: string) => p as TempRoot;

describe('workspaceFor', () => {
  it('places the workspace under the temporary root by relative stem', () => {
    const identity = resolveDocumentIdentity('paper.tex', '/home/u/docs', path.posix);

    expect(workspaceFor(root('/tmp/texloop'), identity, path.posix)).toEqual({
      base: '/tmp/texloop/home/u/docs/paper',
      directory: '/tmp/texloop/home/u/docs',
      baseName: 'paper',
    });
  });

  it('maps same-named documents in different directories apart', () => {
    const a = workspaceFor(root('/t'), resolveDocumentIdentity('/a/b/x.tex', '/', path.posix), path.posix);
    const b = workspaceFor(root('/t'), resolveDocumentIdentity('/a/c/x.tex', '/', path.posix), path.posix);
    expect(a.directory).not.toBe(b.directory);
  });

  it('is stable for the same identity', () => {
    const identity = resolveDocumentIdentity('paper.tex', '/d', path.posix);
    expect(workspaceFor(root('/t'), identity, path.posix)).toEqual(workspaceFor(root('/t'), identity, path.posix));
  });

  it('drops the drive letter on Windows', () => {
    const identity = resolveDocumentIdentity('paper.tex', 'C:\\Users\\u', path.win32);
    expect(workspaceFor(root('C:\\Temp\\texloop'), identity, path.win32).base).toBe('C:\\Temp\\texloop\\Users\\u\\paper');
  });
});

describe('WorkspaceResolver', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await makeTempDir('resolver');
  });

  afterEach(async () => {
    await removeTempDir(tmp);
  });

  it('creates the workspace directory and its parents', async () => {
    const resolver = new WorkspaceResolver(root(path.join(tmp, 'root')), new NodeFileSystem());
    const identity = resolveDocumentIdentity('paper.tex', '/home/u/docs');

    const result = await resolver.resolve(identity);

    expect(result.isOk()).toBe(true);
    const workspace = result._unsafeUnwrap();
    expect(workspace.directory).toBe(path.join(tmp, 'root', 'home', 'u', 'docs'));
    expect((await fs.stat(workspace.directory)).isDirectory()).toBe(true);
  });

  it('succeeds when the workspace already exists', async () => {
    const resolver = new WorkspaceResolver(root(tmp), new NodeFileSystem());
    const identity = resolveDocumentIdentity('paper.tex', '/d');

    expect((await resolver.resolve(identity)).isOk()).toBe(true);
    expect((await resolver.resolve(identity)).isOk()).toBe(true);
  });

  it('reports a creation failure as IoError', async () => {
    const failing: DirectoryOpsPort = {
      mkdirp: () => errAsync({ code: 'FS_PERMISSION_DENIED' as const, message: 'Permission denied: /t/d' }),
      listFiles: () => okAsync([]),
      removeTree: () => okAsync(undefined),
    };
    const resolver = new WorkspaceResolver(root('/t'), failing);

    const result = await resolver.resolve(resolveDocumentIdentity('paper.tex', '/d', path.posix));

    expect(result._unsafeUnwrapErr()).toEqual({
      _tag: 'IoError',
      operation: 'create_workspace',
      path: path.join('/t', 'd'),
      message: `Create temporary directory (${path.join('/t', 'd')}): Permission denied: /t/d`,
    });
  });
});
