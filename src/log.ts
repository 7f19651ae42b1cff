export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type EventFields = Record<string, string | number | boolean | undefined>;

/**
 * One line per lifecycle event: `event=item.success key=Owner/a.txt ms=812`.
 * Values containing spaces, quotes or `=` are JSON-quoted; undefined fields are dropped.
 */
export function formatEvent(event: string, fields: EventFields = {}): string {
  const parts = [`event=${event}`];
  for (const [name, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(`${name}=${/[\s"=]/.test(text) || text === '' ? JSON.stringify(text) : text}`);
  }
  return parts.join(' ');
}

