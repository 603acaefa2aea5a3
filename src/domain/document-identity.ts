import * as path from 'path';

export const SOURCE_EXTENSION = '.tex';

/**
 * Where a document lives, normalized once and never mutated.
 *
 * `relativeStem` is the only key used to place the workspace.
 */
export interface DocumentIdentity {
  /** The document argument exactly as given; the engine receives this. */
  readonly documentArg: string;
  /** Absolute path without the `.tex` extension. */
  readonly stem: string;
  /** Root / drive prefix of `stem` (`/` on POSIX, `C:\` on Windows). */
  readonly volume: string;
  /** `stem` with the volume prefix removed. */
  readonly relativeStem: string;
  /** Last path segment of `stem`; the artifact name prefix. */
  readonly baseName: string;
}

/**
 * Resolve a document argument against `cwd`.
 *
 * Only a trailing `.tex` is stripped; `notes.md` stays `notes.md`, and `paper`
 * is taken as-is (the engine appends `.tex` itself).
 */
export function resolveDocumentIdentity(
  documentArg: string,
  cwd: string,
  pathApi: path.PlatformPath = path
): DocumentIdentity {
  const absolute = pathApi.resolve(cwd, documentArg);
  const stem =
    pathApi.extname(absolute) === SOURCE_EXTENSION ? absolute.slice(0, -SOURCE_EXTENSION.length) : absolute;
  const volume = pathApi.parse(stem).root;

  return {
    documentArg,
    stem,
    volume,
    relativeStem: stem.slice(volume.length),
    baseName: pathApi.basename(stem),
  };
}
