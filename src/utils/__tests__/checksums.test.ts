import { describe, expect, it } from 'vitest';
import { computeDigest, computeShortHash, sha256Hex } from '../checksums.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('checksums', () => {
  it('hashes strings and bytes identically', () => {
    expect(sha256Hex('abc')).toBe(ABC_SHA256);
    expect(sha256Hex(Buffer.from('abc', 'utf8'))).toBe(ABC_SHA256);
  });

  it('prefixes digests with the algorithm', () => {
    expect(computeDigest('abc')).toBe(`sha256:${ABC_SHA256}`);
  });

  it('truncates short hashes to 16 hex characters by default', () => {
    expect(computeShortHash('abc')).toBe('ba7816bf8f01cfea');
    expect(computeShortHash('abc', 8)).toBe('ba7816bf');
  });
});
