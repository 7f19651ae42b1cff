export const UNKNOWN_OWNER = 'Desconhecido';

function segments(raw: string): string[] {
  return raw.replace(/\\/g, '/').split('/').filter((s) => s.length > 0);
}

/**
 * Normalize a listing entry to the canonical `owner/filename` key.
 *
 * Listings under a namespace may return bare names (`x.txt`) or full paths
 * (`Owner/x.txt`, `/Owner/x.txt`); both map to `Owner/x.txt`. Returns null for
 * entries that belong to another namespace or sit deeper than one level.
 */
export function canonicalKey(namespace: string, rawName: string): string | null {
  const owner = segments(namespace);
  if (owner.length !== 1) return null;

  let parts = segments(rawName);
  if (parts.length === 2 && parts[0] === owner[0]) {
    parts = parts.slice(1);
  }
  if (parts.length !== 1) return null;

  return `${owner[0]}/${parts[0]}`;
}

/** Namespace label from the first path segment of a canonical key. */
export function ownerOf(key: string): string {
  const parts = segments(key);
  return parts.length > 1 ? parts[0] : UNKNOWN_OWNER;
}

export function fileNameOf(key: string): string {
  const parts = segments(key);
  return parts[parts.length - 1] ?? key;
}

/** Trims slashes from a folder-like listing entry: `Owner/` and `/Owner` become `Owner`. */
export function namespaceOf(rawName: string): string | null {
  const parts = segments(rawName);
  return parts.length > 0 ? parts[0] : null;
}
