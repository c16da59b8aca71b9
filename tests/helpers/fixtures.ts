import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { DecisionRecord, Evidence } from '../../src/types.js';
import type { ReconciledDecision } from '../../src/core/reconciler.js';
import type { ScoredDecision } from '../../src/core/scorer.js';

/**
 * Temporary source tree. Call cleanup() in afterEach.
 */
export function createTree(files: Record<string, string>): { root: string; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), 'archscry-test-'));
  writeFiles(root, files);
  return { root, cleanup: () => rmSync(root, { recursive: true, force: true }) };
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const absolute = join(root, path);
    mkdirSync(dirname(absolute), { recursive: true });
    writeFileSync(absolute, content);
  }
}

export function makeEvidence(overrides: Partial<Evidence> = {}): Evidence {
  return {
    technologyId: 'postgresql',
    category: 'database',
    filePath: 'config/database.yml',
    lineRef: 2,
    matchStrength: 'content',
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<DecisionRecord> = {}): DecisionRecord {
  return {
    id: 'ADR-001',
    title: 'Use PostgreSQL for database',
    category: 'database',
    technologyId: 'postgresql',
    technologyName: 'PostgreSQL',
    rationale: 'PostgreSQL was detected as the database solution based on evidence in 1 file(s): config/database.yml. 1 reference(s) found, indicating it is the adopted technology for this concern.',
    synthesis: 'template',
    confidence: 0.716,
    confidenceLevel: 'medium',
    evidenceRefs: ['config/database.yml'],
    status: 'ACCEPTED',
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeScored(overrides: Partial<ScoredDecision> = {}): ScoredDecision {
  const evidence = overrides.evidence ?? [makeEvidence()];
  return {
    id: 'ADR-001',
    title: 'Use PostgreSQL for database',
    category: 'database',
    technologyId: 'postgresql',
    technologyName: 'PostgreSQL',
    rationale: 'PostgreSQL was detected as the database solution based on evidence in 1 file(s): config/database.yml. 1 reference(s) found, indicating it is the adopted technology for this concern.',
    synthesis: 'template',
    evidence,
    evidenceRefs: [...new Set(evidence.map((e) => e.filePath))].sort(),
    confidence: 0.716,
    confidenceLevel: 'medium',
    ...overrides,
  };
}

export function makeReconciled(overrides: Partial<DecisionRecord> = {}, evidence?: Evidence[]): ReconciledDecision {
  const record = makeRecord({ status: 'NEW', ...overrides });
  return {
    record,
    evidence:
      evidence ??
      record.evidenceRefs.map((filePath) =>
        makeEvidence({ technologyId: record.technologyId, category: record.category, filePath })
      ),
  };
}
