export interface ItemDescriptor {
  /** Canonical `owner/filename`; the ledger key and the removal key. */
  key: string;
  owner: string;
  name: string;
  size?: number;
  modifiedAt?: string;
}

interface WorkSourceBase {
  readonly description: string;
  /** Owner namespaces, re-listed from scratch on every call. */
  listNamespaces(): Promise<string[]>;
  list(namespace: string): Promise<ItemDescriptor[]>;
  read(key: string): Promise<Buffer>;
}

/** Items stay in place; new work is detected by comparing content fingerprints. */
export interface ContentHashSource extends WorkSourceBase {
  readonly strategy: 'content-hash';
}

/** Items are consumed; presence in the source is itself the "unprocessed" signal. */
export interface PresenceSource extends WorkSourceBase {
  readonly strategy: 'presence';
  remove(key: string): Promise<void>;
}

export type WorkSource = ContentHashSource | PresenceSource;
