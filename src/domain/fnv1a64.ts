import type { ContentHash } from '../ports/content-hash.port.js';

// FNV-1a 64 parameters, split into 32-bit halves.
const OFFSET_BASIS_HI = 0xcbf29ce4;
const OFFSET_BASIS_LO = 0x84222325;
// 0x100000001b3 = 2^40 + 0x1b3
const PRIME_LO = 0x1b3;
const TWO_32 = 4294967296;

/**
 * Incremental 64-bit FNV-1a.
 *
 * Kept in two 32-bit halves so every intermediate product stays below 2^53 and
 * plain number arithmetic is exact:
 *   h * prime mod 2^64 = h * 0x1b3 + (h << 40)
 * where `h << 40` only contributes `lo << 8` to the high half.
 */
export class Fnv1a64 {
  private hi = OFFSET_BASIS_HI;
  private lo = OFFSET_BASIS_LO;

  update(bytes: Uint8Array): this {
    let hi = this.hi;
    let lo = this.lo;
    for (let i = 0; i < bytes.length; i++) {
      lo = (lo ^ bytes[i]) >>> 0;
      const low = lo * PRIME_LO;
      const carry = Math.floor(low / TWO_32);
      hi = (hi * PRIME_LO + carry + lo * 256) % TWO_32;
      lo = low % TWO_32;
    }
    this.hi = hi;
    this.lo = lo;
    return this;
  }

  digest(): ContentHash {
    return (hex32(this.hi) + hex32(this.lo)) as ContentHash;
  }
}

export function fnv1a64(bytes: Uint8Array): ContentHash {
  return new Fnv1a64().update(bytes).digest();
}

function hex32(n: number): string {
  return n.toString(16).padStart(8, '0');
}
