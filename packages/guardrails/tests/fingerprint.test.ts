import { describe, it, expect } from 'vitest';
import { computeImageHash, fingerprint, sha256Hex } from '../src/cache/fingerprint.js';

describe('fingerprint', () => {
  it('is stable for the same prompt and image', () => {
    const image = Buffer.from([1, 2, 3]);
    expect(fingerprint('pasta', image)).toBe(fingerprint('pasta', Buffer.from([1, 2, 3])));
  });

  it('hashes prompt|imageHash', () => {
    const image = Buffer.from('abc');
    expect(fingerprint('pasta', image)).toBe(sha256Hex(`pasta|${sha256Hex(image)}`));
  });

  it('uses an empty image slot when no image is given', () => {
    expect(fingerprint('pasta')).toBe(sha256Hex('pasta|'));
    expect(fingerprint('pasta', null)).toBe(fingerprint('pasta'));
  });

  it('distinguishes a zero-length image from no image', () => {
    expect(fingerprint('pasta', Buffer.alloc(0))).not.toBe(fingerprint('pasta'));
  });

  it('changes when either input changes', () => {
    const image = Buffer.from([9]);
    expect(fingerprint('pasta', image)).not.toBe(fingerprint('pizza', image));
    expect(fingerprint('pasta', image)).not.toBe(fingerprint('pasta', Buffer.from([8])));
  });
});

describe('computeImageHash', () => {
  it('returns null for a missing image', () => {
    expect(computeImageHash(undefined)).toBeNull();
    expect(computeImageHash(null)).toBeNull();
  });

  it('returns the sha256 of the empty buffer for a zero-length image', () => {
    expect(computeImageHash(Buffer.alloc(0))).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });
});
