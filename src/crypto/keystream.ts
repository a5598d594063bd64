/**
 * Rotating single-byte XOR keystream
 *
 * The key is a 64-bit unsigned value rotated with xorshift(13, 7, 17) once
 * per message. Only its low byte masks the payload, so this obscures bytes
 * on the wire and nothing more.
 */

import { bytesToHex } from '@noble/ciphers/utils.js';
import { DEFAULT_SEED } from '../protocol/constants.js';

const U64_MASK = (1n << 64n) - 1n;

/**
 * Advance a key by one xorshift step
 * @param key - Current key, reduced to 64 bits
 * @returns The next key in [0, 2^64)
 */
export function advanceKey(key: bigint): bigint {
  let r = key & U64_MASK;
  r ^= (r << 13n) & U64_MASK;
  r ^= r >> 7n;
  r ^= (r << 17n) & U64_MASK;
  return r;
}

/**
 * XOR every byte with the key's low byte
 *
 * Encryption and decryption are the same operation.
 */
export function transform(bytes: Uint8Array, key: bigint): Uint8Array {
  const mask = Number(key & 0xffn);
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    out[i] = bytes[i] ^ mask;
  }
  return out;
}

/**
 * One endpoint's key state for the lifetime of a session
 */
export class KeyStream {
  private key: bigint;
  private advances = 0;

  constructor(seed: bigint = DEFAULT_SEED) {
    this.key = seed & U64_MASK;
  }

  /** Key that the next message is transformed with */
  get current(): bigint {
    return this.key;
  }

  /** Number of rotations since the seed */
  get position(): number {
    return this.advances;
  }

  /**
   * Transform bytes with the current key, leaving it unchanged
   */
  apply(bytes: Uint8Array): Uint8Array {
    return transform(bytes, this.key);
  }

  /**
   * Rotate to the next key
   * @returns The key that was current before rotating
   */
  advance(): bigint {
    const previous = this.key;
    this.key = advanceKey(this.key);
    this.advances++;
    return previous;
  }

  /** Mask byte as hex, for debug output */
  describe(): string {
    return `#${this.advances} mask=0x${bytesToHex(Uint8Array.of(Number(this.key & 0xffn)))}`;
  }
}
