import { createHash } from 'node:crypto';

/**
 * Full-length SHA-256 hex digest of a work item's bytes.
 * Never truncated.
 */
export function fingerprint(content: Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * True when there is no prior fingerprint for the item or it differs from `digest`.
 */
export function hasChanged(prior: string | null | undefined, digest: string): boolean {
  return prior == null || prior !== digest;
}
