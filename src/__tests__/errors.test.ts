import { describe, it, expect } from 'vitest';
import {
  AuditorError,
  ConfigError,
  TransportError,
  ParseError,
  EnumerationError,
  ItemProcessingError,
  LedgerError,
  StorageError,
  describeError,
} from '../errors.js';

describe('Error hierarchy', () => {
  const errorClasses = [
    { Class: ConfigError, name: 'ConfigError' },
    { Class: TransportError, name: 'TransportError' },
    { Class: ParseError, name: 'ParseError' },
    { Class: EnumerationError, name: 'EnumerationError' },
    { Class: ItemProcessingError, name: 'ItemProcessingError' },
    { Class: LedgerError, name: 'LedgerError' },
    { Class: StorageError, name: 'StorageError' },
  ];

  for (const { Class, name } of errorClasses) {
    it(`${name} is instanceof AuditorError and Error`, () => {
      const err = new Class('test message');
      expect(err).toBeInstanceOf(AuditorError);
      expect(err).toBeInstanceOf(Error);
      expect(err.message).toBe('test message');
      expect(err.name).toBe(name);
    });

    it(`${name} preserves cause`, () => {
      const cause = new Error('root cause');
      const err = new Class('wrapper', cause);
      expect(err.cause).toBe(cause);
    });
  }

  it('AuditorError itself works correctly', () => {
    const err = new AuditorError('base error');
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('base error');
    expect(err.name).toBe('AuditorError');
  });
});

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new LedgerError('ledger down'))).toBe('ledger down');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain string')).toBe('plain string');
    expect(describeError(undefined)).toBe('undefined');
  });
});
