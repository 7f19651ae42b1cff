export interface BucketEntry {
  /** As returned by the provider: either a bare name or a prefixed path. */
  name: string;
  isFolder: boolean;
  size?: number;
  updatedAt?: string;
}

/**
 * Minimal object-storage contract: one bucket with folder-like prefixes.
 */
export interface Bucket {
  readonly name: string;
  list(prefix?: string): Promise<BucketEntry[]>;
  download(key: string): Promise<Buffer>;
  upload(key: string, body: Buffer, contentType: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  remove(keys: string[]): Promise<void>;
}
