import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatDuration, renderRunCard, renderStatusCard } from '../../../src/cli/components/card.js';
import type { CardData } from '../../../src/cli/components/card.js';

chalk.level = 0;

const DATA: CardData = {
  meta: { repoName: 'shop', duration: 42_000, filesScanned: 116, attempts: 1 },
  verdict: 'ACCEPT',
  score: 0.95,
  decisions: { new: 4, enrichment: 1, duplicate: 2, removed: 0 },
  threats: { total: 3, critical: 1 },
  outputDir: '.archscry/output',
  persisted: true,
};

describe('cli/components/card', () => {
  it('should format durations', () => {
    expect(formatDuration(42_000)).toBe('42s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });

  it('should draw a box of equal-width lines', () => {
    const lines = renderRunCard(DATA).split('\n');

    expect(new Set(lines.map((l) => l.length)).size).toBe(1);
    expect(lines[1]).toContain('ARCHSCRY IMPORT COMPLETE');
  });

  it('should show the verdict and mark skipped analyzers', () => {
    const card = renderRunCard(DATA);

    expect(card).toContain('Verdict       ACCEPT (0.95)');
    expect(card).toContain('Threats      3 (1 crit.)');
    expect(card).toContain('Debt report skipped');
    expect(card).not.toContain('Decision store left unchanged');
  });

  it('should say when the store was not written', () => {
    expect(renderRunCard({ ...DATA, persisted: false, meta: { ...DATA.meta, attempts: 2 } })).toContain(
      'Decision store left unchanged'
    );
  });

  it('should list stored decisions by category', () => {
    const card = renderStatusCard('shop', 'ollama', 3, { orm: 1, database: 2 });
    const rows = card.split('\n').filter((l) => l.includes('database') || l.includes('orm'));

    expect(rows).toHaveLength(2);
    expect(rows[0]).toContain('database');
  });
});
