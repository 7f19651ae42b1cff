export class AuditorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigError extends AuditorError {}
export class TransportError extends AuditorError {}
export class ParseError extends AuditorError {}
export class EnumerationError extends AuditorError {}
export class ItemProcessingError extends AuditorError {}
export class LedgerError extends AuditorError {}
export class StorageError extends AuditorError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
