import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_CROSS_DEVICE'; readonly message: string };

/**
 * Port: Directory operations.
 * Used by: workspace resolver, convergence tracker, clean.
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;

  /**
   * Names (not paths) of the regular files directly inside `dirPath`.
   * Subdirectories and other entry types are left out.
   */
  listFiles(dirPath: string): ResultAsync<readonly string[], FsError>;

  /**
   * Remove a directory tree. A missing tree is not an error.
   */
  removeTree(dirPath: string): ResultAsync<void, FsError>;
}

/**
 * Port: File manipulation (rename, exclusive create, read, delete).
 * Used by: result finalizer, workspace lock.
 */
export interface FileManipulationPort {
  /**
   * Single rename. No copy fallback across devices.
   */
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;

  /**
   * Create a file exclusively (fails with FS_ALREADY_EXISTS if present),
   * write `bytes`, fsync and close it. If writing fails the file is removed.
   */
  writeExclusive(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;

  readUtf8(filePath: string): ResultAsync<string, FsError>;

  unlink(filePath: string): ResultAsync<void, FsError>;
}

/**
 * Composite port. The local adapter implements all of it.
 */
export interface FileSystemPort extends DirectoryOpsPort, FileManipulationPort {}
