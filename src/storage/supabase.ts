import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { StorageError } from '../errors.js';
import type { Bucket, BucketEntry } from './types.js';

const LIST_LIMIT = 1000;

export function createSupabaseClient(url: string, key: string): SupabaseClient {
  const base = url.endsWith('/') ? url : `${url}/`;
  return createClient(base, key, { auth: { persistSession: false } });
}

export class SupabaseBucket implements Bucket {
  constructor(
    private client: SupabaseClient,
    readonly name: string,
  ) {}

  private get api() {
    return this.client.storage.from(this.name);
  }

  async list(prefix?: string): Promise<BucketEntry[]> {
    const { data, error } = await this.api.list(prefix, { limit: LIST_LIMIT });
    if (error) {
      throw new StorageError(`Failed to list "${this.name}/${prefix ?? ''}": ${error.message}`, error);
    }
    return (data ?? []).map((entry) => {
      // Folders come back without an id or metadata
      const size: unknown = entry.metadata?.size;
      return {
        name: entry.name,
        isFolder: !entry.id,
        ...(typeof size === 'number' ? { size } : {}),
        ...(entry.updated_at ? { updatedAt: entry.updated_at } : {}),
      };
    });
  }

  async download(key: string): Promise<Buffer> {
    const { data, error } = await this.api.download(key);
    if (error || !data) {
      throw new StorageError(`Failed to download "${this.name}/${key}": ${error?.message ?? 'empty body'}`, error);
    }
    return Buffer.from(await data.arrayBuffer());
  }

  async upload(key: string, body: Buffer, contentType: string): Promise<void> {
    const { error } = await this.api.upload(key, body, { contentType, upsert: false });
    if (error) {
      throw new StorageError(`Failed to upload "${this.name}/${key}": ${error.message}`, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    const slash = key.lastIndexOf('/');
    const folder = slash === -1 ? '' : key.slice(0, slash);
    const file = key.slice(slash + 1);
    // `search` is a pattern match, so compare every returned name exactly
    const { data, error } = await this.api.list(folder, { limit: LIST_LIMIT, search: file });
    if (error) {
      throw new StorageError(`Failed to check "${this.name}/${key}": ${error.message}`, error);
    }
    return (data ?? []).some((entry) => entry.name === file);
  }

  async remove(keys: string[]): Promise<void> {
    const { error } = await this.api.remove(keys);
    if (error) {
      throw new StorageError(`Failed to remove ${keys.length} object(s) from "${this.name}": ${error.message}`, error);
    }
  }
}
