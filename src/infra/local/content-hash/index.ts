import { createReadStream } from 'fs';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { ContentHash, ContentHashPort } from '../../../ports/content-hash.port.js';
import type { FsError } from '../../../ports/fs.port.js';
import { Fnv1a64 } from '../../../domain/fnv1a64.js';
import { mapFsError } from '../fs/index.js';

/**
 * Streams a file through FNV-1a 64 without loading it whole.
 */
export class StreamingContentHasher implements ContentHashPort {
  hashFile(filePath: string): ResultAsync<ContentHash, FsError> {
    return RA.fromPromise(
      (async () => {
        const hasher = new Fnv1a64();
        for await (const chunk of createReadStream(filePath)) {
          hasher.update(toBytes(chunk));
        }
        return hasher.digest();
      })(),
      (e) => mapFsError(e, filePath)
    );
  }
}

// Without an encoding the stream yields Buffers; anything else is a caller bug.
function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  throw new TypeError(`Unexpected stream chunk: ${typeof chunk}`);
}
