import { describe, it, expect } from 'vitest';
import { canonicalKey, fileNameOf, namespaceOf, ownerOf, UNKNOWN_OWNER } from '../keys.js';

describe('canonicalKey', () => {
  it('joins a bare name to its namespace', () => {
    expect(canonicalKey('Vendedor_Ana', 'cliente1.txt')).toBe('Vendedor_Ana/cliente1.txt');
  });

  it('keeps a full prefixed path as is', () => {
    expect(canonicalKey('Vendedor_Ana', 'Vendedor_Ana/cliente1.txt')).toBe('Vendedor_Ana/cliente1.txt');
  });

  it('ignores leading and trailing slashes', () => {
    expect(canonicalKey('Vendedor_Ana/', '/Vendedor_Ana/cliente1.txt')).toBe('Vendedor_Ana/cliente1.txt');
  });

  it('converts backslashes', () => {
    expect(canonicalKey('Vendedor_Ana', 'Vendedor_Ana\\cliente1.txt')).toBe('Vendedor_Ana/cliente1.txt');
  });

  it('rejects a path from another namespace', () => {
    expect(canonicalKey('Vendedor_Ana', 'Vendedor_Bruno/cliente1.txt')).toBeNull();
  });

  it('rejects nested paths', () => {
    expect(canonicalKey('Vendedor_Ana', 'Vendedor_Ana/arquivo/cliente1.txt')).toBeNull();
    expect(canonicalKey('Vendedor_Ana', 'sub/cliente1.txt')).toBeNull();
  });

  it('rejects an empty name or namespace', () => {
    expect(canonicalKey('Vendedor_Ana', '')).toBeNull();
    expect(canonicalKey('', 'cliente1.txt')).toBeNull();
  });
});

describe('ownerOf', () => {
  it('returns the first segment', () => {
    expect(ownerOf('Vendedor_Ana/cliente1.txt')).toBe('Vendedor_Ana');
  });

  it('falls back to the unknown owner for keys without a folder', () => {
    expect(ownerOf('cliente1.txt')).toBe(UNKNOWN_OWNER);
  });
});

describe('fileNameOf / namespaceOf', () => {
  it('extracts the last segment', () => {
    expect(fileNameOf('Vendedor_Ana/cliente1.txt')).toBe('cliente1.txt');
  });

  it('trims slashes from folder entries', () => {
    expect(namespaceOf('Vendedor_Ana/')).toBe('Vendedor_Ana');
    expect(namespaceOf('/Vendedor_Ana/cliente1.txt')).toBe('Vendedor_Ana');
    expect(namespaceOf('/')).toBeNull();
  });
});
