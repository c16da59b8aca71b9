import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import { writeFileSync } from 'fs';
import {
  computeScore,
  recommend,
  validateArtifacts,
  type ValidationResult,
} from '../../../src/core/validator.js';
import { ArtifactRenderer, TECH_DEBT_PATH, THREAT_MODEL_PATH, decisionPath } from '../../../src/output/renderer.js';
import { synthesizeDiagrams } from '../../../src/core/analyzers/diagram-synthesizer.js';
import type { AnalyzerResults } from '../../../src/core/analyzers/index.js';
import { AnalyzerFailure } from '../../../src/core/errors.js';
import { scanTree } from '../../../src/core/tree-scanner.js';
import { defaultConfig } from '../../../src/core/config.js';
import type { ReconciledDecision } from '../../../src/core/reconciler.js';
import type { QualityIssue } from '../../../src/types.js';
import { createTree, makeReconciled } from '../../helpers/fixtures.js';

const THRESHOLDS = defaultConfig().validation;

const FILES = {
  'config/database.yml': 'production:\n  dialect: postgres\n',
  'tests/fixtures/db.yml': 'dialect: postgres\n',
  'tests/fixtures/other.yml': 'dialect: postgres\n',
};

interface Run {
  renderer: ArtifactRenderer;
  validate: () => ValidationResult;
}

describe('core/validator', () => {
  let cleanup: () => void = () => {};

  afterEach(() => {
    cleanup();
    cleanup = () => {};
  });

  async function render(decisions: ReconciledDecision[], analyzers: Partial<AnalyzerResults> = {}): Promise<Run> {
    const tree = createTree(FILES);
    cleanup = tree.cleanup;
    const inventory = await scanTree(tree.root, defaultConfig());
    const renderer = new ArtifactRenderer(join(tree.root, 'out'));
    renderer.prepare();

    const results: AnalyzerResults = {
      diagrams: { name: 'diagrams', status: 'succeeded', artifact: synthesizeDiagrams(decisions) },
      threats: { name: 'threat-model', status: 'succeeded', artifact: { threats: [] } },
      debt: {
        name: 'tech-debt',
        status: 'succeeded',
        artifact: {
          items: [
            { id: 'TD-001', title: '1 TODO marker(s)', priority: 'P3', category: 'workaround', location: 'src/a.ts:1', effortEstimateHours: 0.5 },
          ],
        },
      },
      ...analyzers,
    };
    const artifacts = renderer.renderAll({
      decisions,
      diagrams: results.diagrams.artifact,
      threats: results.threats?.artifact,
      debt: results.debt?.artifact,
    });

    return {
      renderer,
      validate: () =>
        validateArtifacts({ renderer, inventory, decisions, analyzers: results, artifacts, thresholds: THRESHOLDS }),
    };
  }

  describe('computeScore and recommend', () => {
    it('should start at 1.0, subtract penalties and floor at 0', () => {
      expect(computeScore([])).toBe(1);
      expect(computeScore([0.1, 0.05])).toBe(0.85);
      expect(computeScore(Array(30).fill(0.05))).toBe(0);
    });

    it('should never rise as penalties are added', () => {
      let previous = computeScore([]);
      const penalties: number[] = [];
      for (const p of [0.05, 0.1, 0, 0.05, 0.1]) {
        penalties.push(p);
        const score = computeScore(penalties);
        expect(score).toBeLessThanOrEqual(previous);
        previous = score;
      }
    });

    it('should apply inclusive thresholds', () => {
      expect(recommend(0.85, [], THRESHOLDS)).toBe('ACCEPT');
      expect(recommend(0.8499, [], THRESHOLDS)).toBe('REVIEW');
      expect(recommend(0.7, [], THRESHOLDS)).toBe('REVIEW');
      expect(recommend(0.6999, [], THRESHOLDS)).toBe('REJECT');
    });

    it('should reject on any critical issue whatever the score', () => {
      const critical: QualityIssue = {
        checker: 'artifact-presence',
        severity: 'CRITICAL',
        message: 'Required artifact x is missing',
        penalty: 0.05,
      };

      expect(recommend(1, [critical], THRESHOLDS)).toBe('REJECT');
    });
  });

  describe('validateArtifacts', () => {
    it('should accept a clean run without corrections', async () => {
      const run = await render([makeReconciled()]);

      const { report } = run.validate();

      expect(report).toEqual({ score: 1, issues: [], correctionsApplied: [], recommendation: 'ACCEPT' });
    });

    it('should remove a decision whose evidence is mostly non-production', async () => {
      const polluted = makeReconciled({ evidenceRefs: ['tests/fixtures/db.yml'] });
      const run = await render([polluted]);

      const { report, decisions, artifacts } = run.validate();

      expect(report.score).toBe(0.95);
      expect(report.recommendation).toBe('ACCEPT');
      expect(report.issues).toEqual([
        {
          checker: 'evidence-pollution',
          severity: 'WARNING',
          message: 'ADR-001 (PostgreSQL) removed: 100% of its evidence is on non-production paths',
          target: 'ADR-001',
          penalty: 0.05,
        },
      ]);
      expect(report.correctionsApplied).toEqual([
        'Removed ADR-001 (PostgreSQL) and deleted decisions/ADR-001-use-postgresql-for-database.yml',
      ]);
      expect(decisions[0].record.status).toBe('REMOVED');
      expect(run.renderer.exists(decisionPath(polluted.record))).toBe(false);
      expect(artifacts.some((a) => a.kind === 'decision')).toBe(false);
    });

    it('should keep a decision at or under the pollution ratio', async () => {
      const mixed = makeReconciled({
        evidenceRefs: ['config/database.yml', 'tests/fixtures/db.yml', 'tests/fixtures/other.yml'],
      });
      const run = await render([mixed]);

      const { report, decisions } = run.validate();

      expect(report.issues).toEqual([]);
      expect(decisions[0].record.status).toBe('NEW');
    });

    it('should re-render a report that lists fewer items than were computed', async () => {
      const run = await render([makeReconciled()]);
      writeFileSync(run.renderer.resolve(TECH_DEBT_PATH), 'items: []\n');

      const { report } = run.validate();

      expect(report.score).toBe(0.9);
      expect(report.issues.map((i) => i.message)).toEqual(['Tech debt report listed 0 of 1 item(s)']);
      expect(report.correctionsApplied).toEqual(['Re-rendered reports/tech-debt.yml with all 1 item(s)']);
      expect(run.renderer.read(TECH_DEBT_PATH)).toMatchObject({ summary: { total: 1 } });
    });

    it('should regenerate a diagram that names none of the detected technologies', async () => {
      const run = await render([makeReconciled()]);
      writeFileSync(run.renderer.resolve('architecture/system-context.yml'), 'source: "graph LR"\n');

      const { report } = run.validate();

      expect(report.score).toBe(0.95);
      expect(report.issues.map((i) => i.message)).toEqual([
        'Diagram system-context referenced none of the detected technologies',
      ]);
      expect(run.renderer.read('architecture/system-context.yml')).toMatchObject({
        technologies: ['PostgreSQL'],
      });
    });

    it('should reject when a required artifact is missing', async () => {
      const run = await render([makeReconciled()]);
      run.renderer.remove(THREAT_MODEL_PATH);

      const { report } = run.validate();

      expect(report.issues).toEqual([
        {
          checker: 'artifact-presence',
          severity: 'CRITICAL',
          message: 'Required artifact security/threat-model.yml is missing',
          target: 'security/threat-model.yml',
          penalty: 0.05,
        },
      ]);
      expect(report.score).toBe(0.95);
      expect(report.recommendation).toBe('REJECT');
    });

    it('should warn about a failed analyzer', async () => {
      const run = await render([makeReconciled()], {
        threats: {
          name: 'threat-model',
          status: 'failed',
          artifact: { threats: [], failed: true, error: 'threat-model failed: boom' },
          error: new AnalyzerFailure('threat-model', new Error('boom')),
        },
      });

      const { report } = run.validate();

      expect(report.issues).toEqual([
        {
          checker: 'analyzer-failure',
          severity: 'WARNING',
          message: 'threat-model failed: boom',
          target: 'threat-model',
          penalty: 0.05,
        },
      ]);
      expect(report.recommendation).toBe('ACCEPT');
    });

    it('should flag low-confidence decisions without a penalty', async () => {
      const run = await render([makeReconciled({ confidence: 0.42, confidenceLevel: 'low' })]);

      const { report } = run.validate();

      expect(report.score).toBe(1);
      expect(report.issues).toEqual([
        {
          checker: 'low-confidence',
          severity: 'INFO',
          message: 'ADR-001 (PostgreSQL) has low confidence (0.42) and needs manual review',
          target: 'ADR-001',
          penalty: 0,
        },
      ]);
    });
  });
});
