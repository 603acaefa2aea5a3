import type { ResultAsync } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import type { FsError } from './fs.port.js';

/**
 * 64-bit content digest rendered as 16 lowercase hex characters.
 */
export type ContentHash = Brand<string, 'ContentHash'>;

/**
 * Port: whole-file content hashing for change detection.
 *
 * Guarantees:
 * - Deterministic: same bytes → same hash
 * - Covers the full byte stream, in order
 *
 * Not a security primitive; collisions only cost an extra (or a missed) pass.
 */
export interface ContentHashPort {
  hashFile(filePath: string): ResultAsync<ContentHash, FsError>;
}
