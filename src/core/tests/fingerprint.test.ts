import { describe, it, expect } from 'vitest';
import { fingerprint, hasChanged } from '../fingerprint.js';

describe('fingerprint', () => {
  it('is the full SHA-256 hex digest', () => {
    expect(fingerprint(Buffer.from('abc'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });

  it('depends only on bytes', () => {
    expect(fingerprint(Buffer.from('Cliente: oi'))).toBe(fingerprint('Cliente: oi'));
  });

  it('differs when content differs', () => {
    expect(fingerprint('A')).not.toBe(fingerprint('B'));
  });
});

describe('hasChanged', () => {
  const digest = fingerprint('A');

  it('is true without a prior fingerprint', () => {
    expect(hasChanged(null, digest)).toBe(true);
    expect(hasChanged(undefined, digest)).toBe(true);
  });

  it('is false for the same fingerprint', () => {
    expect(hasChanged(fingerprint('A'), digest)).toBe(false);
  });

  it('is true for a different fingerprint', () => {
    expect(hasChanged(fingerprint('B'), digest)).toBe(true);
  });
});
