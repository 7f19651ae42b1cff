import { describe, it, expect } from 'vitest';
import { compactTimestamp, firstFreeName, reportName } from '../naming.js';

const AT = new Date('2026-10-18T20:35:00.123Z');

describe('reportName', () => {
  it('combines prefix, owner, file stem and timestamp', () => {
    expect(compactTimestamp(AT)).toBe('20261018T203500123Z');
    expect(reportName('AUDITORIA', 'Vendedor_Bruno', 'x.txt', AT)).toBe(
      'AUDITORIA_Vendedor_Bruno_x_20261018T203500123Z.md',
    );
  });

  it('replaces unsafe characters', () => {
    expect(reportName('RELATORIO', 'Vendedor_Ana', 'cliente 1 (novo).txt', AT)).toBe(
      'RELATORIO_Vendedor_Ana_cliente_1_novo_20261018T203500123Z.md',
    );
  });

  it('differs for two analyses of the same file at different times', () => {
    const later = new Date(AT.getTime() + 1);
    expect(reportName('AUDITORIA', 'A', 'x.txt', AT)).not.toBe(reportName('AUDITORIA', 'A', 'x.txt', later));
  });
});

describe('firstFreeName', () => {
  it('returns the name when it is free', async () => {
    expect(await firstFreeName('r.md', async () => false)).toBe('r.md');
  });

  it('adds a numeric suffix until the name is free', async () => {
    const taken = new Set(['r.md', 'r-1.md']);
    expect(await firstFreeName('r.md', async (c) => taken.has(c))).toBe('r-2.md');
  });
});
