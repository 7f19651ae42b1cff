import fsp from 'node:fs/promises';
import path from 'node:path';
import { glob } from 'glob';
import { canonicalKey, fileNameOf, ownerOf } from './keys.js';
import type { ContentHashSource, ItemDescriptor } from './types.js';

/**
 * Transcript inbox on the local filesystem:
 * `<root>/<owner>/<name><extension>`, one level deep.
 */
export class LocalWorkSource implements ContentHashSource {
  readonly strategy = 'content-hash';

  constructor(
    private root: string,
    private extension = '.txt',
  ) {}

  get description(): string {
    return `local:${this.root}`;
  }

  async listNamespaces(): Promise<string[]> {
    const entries = await fsp.readdir(this.root, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
      .map((e) => e.name)
      .sort();
  }

  async list(namespace: string): Promise<ItemDescriptor[]> {
    const dir = path.join(this.root, namespace);
    const files = await glob(`*${this.extension}`, {
      cwd: dir,
      nodir: true,
      dot: false,
      absolute: false,
    });

    const items: ItemDescriptor[] = [];
    for (const file of files.sort()) {
      const key = canonicalKey(namespace, file);
      if (!key) continue;
      // Size and mtime are hints only; an unreadable entry still gets listed
      // so that its read fails as a per-item error.
      const stat = await fsp.stat(path.join(dir, file)).catch(() => undefined);
      items.push({
        key,
        owner: ownerOf(key),
        name: fileNameOf(key),
        ...(stat ? { size: stat.size, modifiedAt: stat.mtime.toISOString() } : {}),
      });
    }
    return items;
  }

  async read(key: string): Promise<Buffer> {
    return fsp.readFile(path.join(this.root, ...key.split('/')));
  }
}
