import path from 'node:path';

/** `2026-10-18T20:35:00.123Z` -> `20261018T203500123Z` */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

function safeSegment(value: string): string {
  return value.replace(/[^\p{L}\p{N}_-]+/gu, '_').replace(/^_+|_+$/g, '') || 'sem_nome';
}

/**
 * Deterministic report name for one analysis of `filename`:
 * `<prefix>_<owner>_<stem>_<timestamp>.md`.
 */
export function reportName(prefix: string, owner: string, filename: string, now: Date): string {
  const stem = path.posix.basename(filename, path.posix.extname(filename));
  return `${prefix}_${safeSegment(owner)}_${safeSegment(stem)}_${compactTimestamp(now)}.md`;
}

/**
 * First of `name`, `name-1.md`, `name-2.md`, ... for which `exists` is false.
 */
export async function firstFreeName(
  name: string,
  exists: (candidate: string) => Promise<boolean>,
): Promise<string> {
  const stem = name.replace(/\.md$/, '');
  let candidate = name;
  for (let n = 1; await exists(candidate); n++) {
    candidate = `${stem}-${n}.md`;
  }
  return candidate;
}
