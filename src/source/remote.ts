import path from 'node:path';
import type { Bucket } from '../storage/types.js';
import { canonicalKey, fileNameOf, ownerOf, namespaceOf } from './keys.js';
import type { ItemDescriptor, PresenceSource } from './types.js';

export interface RemoteWorkSourceOptions {
  extension?: string;
  /** Only namespaces starting with this prefix are scanned. Empty means all. */
  ownerPrefix?: string;
}

/**
 * Transcript inbox in an object-storage bucket with owner-prefixed keys.
 * Every key leaving this class is canonical `owner/filename`, whatever shape
 * the listing returned.
 */
export class RemoteWorkSource implements PresenceSource {
  readonly strategy = 'presence';
  private extension: string;
  private ownerPrefix: string;

  constructor(
    private bucket: Bucket,
    options: RemoteWorkSourceOptions = {},
  ) {
    this.extension = options.extension ?? '.txt';
    this.ownerPrefix = options.ownerPrefix ?? '';
  }

  get description(): string {
    return `bucket:${this.bucket.name}`;
  }

  async listNamespaces(): Promise<string[]> {
    const entries = await this.bucket.list();
    const seen = new Set<string>();
    const namespaces: string[] = [];

    for (const entry of entries) {
      // Folders, or flattened keys whose first segment is the folder
      const flattened = entry.name.replace(/^\/+/, '').includes('/');
      if (!entry.isFolder && !flattened) continue;
      const ns = namespaceOf(entry.name);
      if (!ns || !ns.startsWith(this.ownerPrefix) || seen.has(ns)) continue;
      seen.add(ns);
      namespaces.push(ns);
    }
    return namespaces;
  }

  async list(namespace: string): Promise<ItemDescriptor[]> {
    const entries = await this.bucket.list(namespace);
    const items: ItemDescriptor[] = [];
    const seen = new Set<string>();

    for (const entry of entries) {
      if (entry.isFolder) continue;
      if (path.posix.extname(entry.name) !== this.extension) continue;
      const key = canonicalKey(namespace, entry.name);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      items.push({
        key,
        owner: ownerOf(key),
        name: fileNameOf(key),
        ...(entry.size !== undefined ? { size: entry.size } : {}),
        ...(entry.updatedAt !== undefined ? { modifiedAt: entry.updatedAt } : {}),
      });
    }
    return items;
  }

  async read(key: string): Promise<Buffer> {
    return this.bucket.download(key);
  }

  async remove(key: string): Promise<void> {
    await this.bucket.remove([key]);
  }
}
