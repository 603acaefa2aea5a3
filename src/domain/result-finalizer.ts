import type { ResultAsync } from 'neverthrow';
import type { OutputFormat } from '../config/app-config.js';
import type { FileManipulationPort } from '../ports/fs.port.js';
import type { IoError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { DocumentIdentity } from './document-identity.js';
import type { Workspace } from './workspace-resolver.js';

export interface Relocation {
  readonly from: string;
  readonly to: string;
}

/**
 * Where the output lands: beside the source document, same stem.
 */
export function relocationFor(workspace: Workspace, identity: DocumentIdentity, format: OutputFormat): Relocation {
  return {
    from: `${workspace.base}.${format}`,
    to: `${identity.stem}.${format}`,
  };
}

/**
 * Move the engine's output out of the workspace with one rename.
 * Missing output, a cross-device move, or a permission problem all fail the run.
 */
export function relocateOutput(
  fs: FileManipulationPort,
  workspace: Workspace,
  identity: DocumentIdentity,
  format: OutputFormat
): ResultAsync<Relocation, IoError> {
  const relocation = relocationFor(workspace, identity, format);
  return fs
    .rename(relocation.from, relocation.to)
    .mapErr((e) => Err.io('relocate_output', relocation.from, e.message))
    .map(() => relocation);
}
