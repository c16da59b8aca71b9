import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import { readdirSync, writeFileSync, mkdirSync } from 'fs';
import {
  ArtifactRenderer,
  TECH_DEBT_PATH,
  THREAT_MODEL_PATH,
  decisionPath,
  serializeYaml,
  slugify,
} from '../../../src/output/renderer.js';
import { synthesizeDiagrams } from '../../../src/core/analyzers/diagram-synthesizer.js';
import { createTree, makeReconciled } from '../../helpers/fixtures.js';

describe('output/renderer', () => {
  let cleanup: () => void = () => {};

  afterEach(() => {
    cleanup();
    cleanup = () => {};
  });

  function tempRenderer(serialize = serializeYaml): ArtifactRenderer {
    const tree = createTree({});
    cleanup = tree.cleanup;
    const renderer = new ArtifactRenderer(join(tree.root, 'out'), serialize);
    renderer.prepare();
    return renderer;
  }

  describe('slugify', () => {
    it('should build file-safe slugs', () => {
      expect(slugify('Use PostgreSQL for database')).toBe('use-postgresql-for-database');
      expect(slugify('Use Next.js for framework')).toBe('use-next-js-for-framework');
      expect(slugify('***')).toBe('decision');
    });
  });

  describe('renderDecision', () => {
    it('should write free text that survives the YAML round trip', () => {
      const renderer = tempRenderer();
      const decision = makeReconciled({
        rationale: 'Picks *fast* _stores_ # not a comment: still text',
        narrative: 'key: value\n- not a list\n"quoted" and \'single\'',
      });

      const artifact = renderer.renderDecision(decision);

      expect(artifact).toEqual({
        kind: 'decision',
        path: 'decisions/ADR-001-use-postgresql-for-database.yml',
        ok: true,
        target: 'ADR-001',
      });
      expect(renderer.read(artifact.path)).toMatchObject({
        id: 'ADR-001',
        status: 'NEW',
        technology: { id: 'postgresql', name: 'PostgreSQL' },
        rationale: 'Picks *fast* _stores_ # not a comment: still text',
        narrative: 'key: value\n- not a list\n"quoted" and \'single\'',
        evidence: ['config/database.yml'],
      });
    });

    it('should mark an artifact failed when the written file does not parse back', () => {
      const renderer = tempRenderer(() => 'id: [unclosed');
      const decision = makeReconciled();

      const artifact = renderer.renderDecision(decision);

      expect(artifact.ok).toBe(false);
      expect(artifact.error?.kind).toBe('serialization');
      expect(artifact.error?.message).toMatch(/^decisions\/ADR-001-use-postgresql-for-database\.yml did not round-trip/);
    });

    it('should mark an artifact failed when the parsed content differs', () => {
      const renderer = tempRenderer(() => serializeYaml({ tampered: true }));

      const artifact = renderer.renderDecision(makeReconciled());

      expect(artifact.error?.message).toBe(
        'decisions/ADR-001-use-postgresql-for-database.yml did not round-trip through the YAML parser: ' +
          'parsed content differs from the rendered data'
      );
    });
  });

  describe('renderAll', () => {
    it('should write every artifact and skip removed decisions', () => {
      const renderer = tempRenderer();
      const kept = makeReconciled();
      const removed = makeReconciled({ id: 'ADR-002', status: 'REMOVED', technologyId: 'mysql', title: 'Use MySQL for database' });

      const artifacts = renderer.renderAll({
        decisions: [kept, removed],
        diagrams: synthesizeDiagrams([kept]),
        threats: { threats: [] },
        debt: { items: [] },
      });

      expect(artifacts.map((a) => [a.path, a.ok])).toEqual([
        ['decisions/ADR-001-use-postgresql-for-database.yml', true],
        ['architecture/system-context.yml', true],
        ['architecture/technology-stack.yml', true],
        ['security/threat-model.yml', true],
        ['reports/tech-debt.yml', true],
      ]);
      expect(renderer.exists(decisionPath(removed.record))).toBe(false);
    });

    it('should write flagged empty files for failed analyzers', () => {
      const renderer = tempRenderer();

      renderer.renderAll({
        decisions: [],
        diagrams: { diagrams: [], failed: true, error: 'diagrams failed: boom' },
        threats: { threats: [], failed: true, error: 'threat-model failed: boom' },
      });

      expect(renderer.read('architecture/system-context.yml')).toMatchObject({
        failed: true,
        error: 'diagrams failed: boom',
        nodes: [],
      });
      expect(renderer.read(THREAT_MODEL_PATH)).toEqual({
        failed: true,
        error: 'threat-model failed: boom',
        summary: { total: 0, critical: 0, escalated: 0 },
        threats: [],
      });
      expect(renderer.exists(TECH_DEBT_PATH)).toBe(false);
    });
  });

  describe('renderDebtReport', () => {
    it('should summarize items by priority and total effort', () => {
      const renderer = tempRenderer();

      const artifact = renderer.renderDebtReport({
        items: [
          { id: 'TD-001', title: 'a', priority: 'P1', category: 'complexity', location: 'src/a.ts', effortEstimateHours: 8 },
          { id: 'TD-002', title: 'b', priority: 'P3', category: 'debug-leftover', location: 'src/b.ts:4', effortEstimateHours: 0.25 },
        ],
      });

      expect(artifact.itemCount).toBe(2);
      expect(renderer.read(TECH_DEBT_PATH)).toMatchObject({
        summary: { total: 2, byPriority: { P0: 0, P1: 1, P2: 0, P3: 1 }, effortEstimateHours: 8.25 },
      });
    });
  });

  describe('prepare', () => {
    it('should clear files from an earlier run', () => {
      const renderer = tempRenderer();
      mkdirSync(renderer.resolve('decisions'), { recursive: true });
      writeFileSync(renderer.resolve('decisions/ADR-009-old.yml'), 'id: ADR-009\n');

      renderer.prepare();

      expect(readdirSync(renderer.outputDir)).toEqual([]);
    });
  });
});
