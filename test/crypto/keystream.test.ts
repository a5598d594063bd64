/**
 * Tests for the rotating XOR keystream
 */

import { describe, it, expect } from 'vitest';
import { advanceKey, transform, KeyStream } from '../../src/crypto/keystream.js';
import { DEFAULT_SEED } from '../../src/protocol/constants.js';

describe('advanceKey', () => {
  it('should produce the known sequence from the default seed', () => {
    const first = advanceKey(DEFAULT_SEED);
    const second = advanceKey(first);
    const third = advanceKey(second);
    const fourth = advanceKey(third);

    expect(first).toBe(132100702508589007n);
    expect(second).toBe(14571250924493977904n);
    expect(third).toBe(3156334742818316866n);
    expect(fourth).toBe(1914567331323306758n);
  });

  it('should be deterministic', () => {
    expect(advanceKey(42n)).toBe(advanceKey(42n));
  });

  it('should keep zero fixed and map one to a known value', () => {
    expect(advanceKey(0n)).toBe(0n);
    expect(advanceKey(1n)).toBe(1082269761n);
  });

  it('should stay within 64 bits', () => {
    let key = DEFAULT_SEED;
    for (let i = 0; i < 100; i++) {
      key = advanceKey(key);
      expect(key >= 0n && key < 1n << 64n).toBe(true);
    }
  });
});

describe('transform', () => {
  it('should XOR every byte with the low byte of the key', () => {
    const out = transform(Uint8Array.of(0x00, 0xff, 0x15), DEFAULT_SEED);
    expect(Array.from(out)).toEqual([0x15, 0xea, 0x00]);
  });

  it('should be its own inverse', () => {
    const bytes = Uint8Array.from({ length: 64 }, (_, i) => i * 3);
    const key = 132100702508589007n;
    expect(transform(transform(bytes, key), key)).toEqual(bytes);
  });

  it('should return an empty array for empty input', () => {
    expect(transform(new Uint8Array(0), DEFAULT_SEED).length).toBe(0);
  });

  it('should not modify its input', () => {
    const bytes = Uint8Array.of(1, 2, 3);
    transform(bytes, DEFAULT_SEED);
    expect(Array.from(bytes)).toEqual([1, 2, 3]);
  });
});

describe('KeyStream', () => {
  it('should start at the seed with position 0', () => {
    const keys = new KeyStream();
    expect(keys.current).toBe(DEFAULT_SEED);
    expect(keys.position).toBe(0);
  });

  it('should return the previous key when advancing', () => {
    const keys = new KeyStream();
    expect(keys.advance()).toBe(DEFAULT_SEED);
    expect(keys.current).toBe(132100702508589007n);
    expect(keys.position).toBe(1);
  });

  it('should apply the current key without advancing', () => {
    const keys = new KeyStream();
    keys.advance();
    expect(Array.from(keys.apply(Uint8Array.of(0x00)))).toEqual([207]);
    expect(keys.position).toBe(1);
  });

  it('should reduce an oversized seed to 64 bits', () => {
    const keys = new KeyStream((1n << 64n) + 5n);
    expect(keys.current).toBe(5n);
  });

  it('should describe position and mask byte', () => {
    const keys = new KeyStream();
    expect(keys.describe()).toBe('#0 mask=0x15');
    keys.advance();
    expect(keys.describe()).toBe('#1 mask=0xcf');
  });
});
