import * as fs from 'fs/promises';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';

export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  // Node errors typically expose a string `code` property; treat it as best-effort.
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Classify a Node fs rejection. Shared by every local adapter that touches files.
 */
export function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  if (code === 'EXDEV') return { code: 'FS_CROSS_DEVICE', message: `Cannot move across filesystems: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  listFiles(dirPath: string): ResultAsync<readonly string[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath, { withFileTypes: true }), (e) => mapFsError(e, dirPath)).map((entries) =>
      entries.filter((entry) => entry.isFile()).map((entry) => entry.name)
    );
  }

  removeTree(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rm(dirPath, { recursive: true, force: true }), (e) => mapFsError(e, dirPath));
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  writeExclusive(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(
      (async () => {
        // 'wx' = O_CREAT | O_EXCL | O_WRONLY
        const handle = await fs.open(filePath, 'wx', 0o600);
        let written = false;
        try {
          await handle.writeFile(bytes);
          await handle.sync();
          written = true;
        } finally {
          await handle.close();
          // No empty or partial file is left behind.
          if (!written) await fs.rm(filePath, { force: true });
        }
      })(),
      (e) => mapFsError(e, filePath)
    );
  }

  readUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath), (e) => mapFsError(e, filePath));
  }
}
