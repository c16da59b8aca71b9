/**
 * Post-Generation Validator
 *
 * Re-inspects what the renderer wrote, fixes what it can, and scores
 * the run. Checkers run in a fixed order, each returning its issues,
 * the corrections it applied and the penalty it costs:
 *
 *   1. evidence pollution      remove decision           -0.05 each
 *   2. completeness            re-render report          -0.10 each
 *   3. diagram specificity     regenerate diagram        -0.05 each
 *   4. artifact presence       CRITICAL                  -0.05 each
 *   5. serialization failures  CRITICAL                  -0.05 each
 *   6. analyzer failures       WARNING                   -0.05 each
 *   7. low confidence          INFO                       0
 *
 * The score starts at 1.0 and is floored at 0.0. Any CRITICAL issue
 * forces REJECT.
 */

import { z } from 'zod';
import {
  ArchscryConfig,
  DecisionRecord,
  FileInventory,
  FileKind,
  QualityIssue,
  QualityReport,
  Recommendation,
} from '../types.js';
import { ReconciledDecision } from './reconciler.js';
import { AnalyzerResults } from './analyzers/index.js';
import { DIAGRAM_KINDS, escapeLabel, synthesizeDiagram } from './analyzers/diagram-synthesizer.js';
import { isNonProduction } from './tree-scanner.js';
import {
  ArtifactRenderer,
  RenderedArtifact,
  TECH_DEBT_PATH,
  THREAT_MODEL_PATH,
  decisionPath,
  diagramPath,
} from '../output/renderer.js';

export const PENALTIES = {
  pollution: 0.05,
  incomplete: 0.1,
  diagram: 0.05,
  missing: 0.05,
  serialization: 0.05,
  analyzer: 0.05,
} as const;

export type Thresholds = ArchscryConfig['validation'];

export interface CheckResult {
  issues: QualityIssue[];
  corrections: string[];
  penalty: number;
}

export interface ValidationInput {
  renderer: ArtifactRenderer;
  inventory: FileInventory;
  decisions: ReconciledDecision[];
  // Persisted records carried over from earlier runs
  stored?: DecisionRecord[];
  analyzers: AnalyzerResults;
  artifacts: RenderedArtifact[];
  thresholds: Thresholds;
}

export interface ValidationResult {
  report: QualityReport;
  decisions: ReconciledDecision[];
  artifacts: RenderedArtifact[];
}

/**
 * Working state shared by the checkers of one validation pass
 */
export interface ValidationState {
  renderer: ArtifactRenderer;
  kinds: Map<string, FileKind>;
  decisions: ReconciledDecision[];
  stored: DecisionRecord[];
  analyzers: AnalyzerResults;
  artifacts: RenderedArtifact[];
  thresholds: Thresholds;
}

type Checker = (state: ValidationState) => CheckResult;

export function validateArtifacts(input: ValidationInput): ValidationResult {
  const state: ValidationState = {
    renderer: input.renderer,
    kinds: new Map(input.inventory.files.map((f) => [f.path, f.kind])),
    decisions: input.decisions,
    stored: input.stored ?? [],
    analyzers: input.analyzers,
    artifacts: input.artifacts,
    thresholds: input.thresholds,
  };

  const checkers: Checker[] = [
    checkEvidencePollution,
    checkCompleteness,
    checkDiagramSpecificity,
    checkArtifactPresence,
    checkSerialization,
    checkAnalyzerFailures,
    checkLowConfidence,
  ];

  const issues: QualityIssue[] = [];
  const corrections: string[] = [];
  const penalties: number[] = [];

  for (const checker of checkers) {
    const result = checker(state);
    issues.push(...result.issues);
    corrections.push(...result.corrections);
    penalties.push(result.penalty);
  }

  const score = computeScore(penalties);
  return {
    report: {
      score,
      issues,
      correctionsApplied: corrections,
      recommendation: recommend(score, issues, input.thresholds),
    },
    decisions: state.decisions,
    artifacts: state.artifacts,
  };
}

/**
 * 1.0 minus every penalty, floored at 0. Rounded so a sum of 0.05 steps
 * lands exactly on the thresholds.
 */
export function computeScore(penalties: number[]): number {
  const total = penalties.reduce((sum, p) => sum + Math.max(0, p), 0);
  return Math.max(0, Math.round((1 - total) * 10_000) / 10_000);
}

export function recommend(score: number, issues: QualityIssue[], thresholds: Thresholds): Recommendation {
  if (issues.some((i) => i.severity === 'CRITICAL')) {
    return 'REJECT';
  }
  if (score >= thresholds.acceptThreshold) {
    return 'ACCEPT';
  }
  if (score >= thresholds.reviewThreshold) {
    return 'REVIEW';
  }
  return 'REJECT';
}

// ─────────────────────────────────────────────────────────────
// Checkers
// ─────────────────────────────────────────────────────────────

export function checkEvidencePollution(state: ValidationState): CheckResult {
  const result = emptyResult();

  state.decisions = state.decisions.map((decision): ReconciledDecision => {
    const { record } = decision;
    if (record.status === 'REMOVED') return decision;

    const files = [...new Set(decision.evidence.map((e) => e.filePath))];
    if (files.length === 0) return decision;

    const polluted = files.filter((f) => {
      const kind = state.kinds.get(f);
      return kind !== undefined && isNonProduction(kind);
    }).length;
    const ratio = polluted / files.length;
    if (ratio <= state.thresholds.pollutionRatio) return decision;

    const path = decisionPath(record);
    state.renderer.remove(path);
    state.artifacts = state.artifacts.filter((a) => a.path !== path);

    const percent = Math.round(ratio * 100);
    result.issues.push({
      checker: 'evidence-pollution',
      severity: 'WARNING',
      message: `${record.id} (${record.technologyName}) removed: ${percent}% of its evidence is on non-production paths`,
      target: record.id,
      penalty: PENALTIES.pollution,
    });
    result.corrections.push(`Removed ${record.id} (${record.technologyName}) and deleted ${path}`);
    result.penalty += PENALTIES.pollution;

    return { ...decision, record: { ...record, status: 'REMOVED' } };
  });

  return result;
}

const ThreatFile = z.object({ threats: z.array(z.unknown()) });
const DebtFile = z.object({ items: z.array(z.unknown()) });

export function checkCompleteness(state: ValidationState): CheckResult {
  const result = emptyResult();
  const { threats, debt } = state.analyzers;

  const reports = [
    threats && {
      path: THREAT_MODEL_PATH,
      label: 'Threat model',
      computed: threats.artifact.threats.length,
      count: (data: unknown) => countItems(ThreatFile.safeParse(data), (d) => d.threats.length),
      rerender: () => state.renderer.renderThreatModel(threats.artifact),
    },
    debt && {
      path: TECH_DEBT_PATH,
      label: 'Tech debt report',
      computed: debt.artifact.items.length,
      count: (data: unknown) => countItems(DebtFile.safeParse(data), (d) => d.items.length),
      rerender: () => state.renderer.renderDebtReport(debt.artifact),
    },
  ];

  for (const report of reports) {
    if (!report || !state.renderer.exists(report.path)) continue;

    let rendered: number;
    try {
      rendered = report.count(state.renderer.read(report.path));
    } catch {
      rendered = 0;
    }
    if (rendered >= report.computed) continue;

    const artifact = report.rerender();
    replaceArtifact(state, artifact);

    result.issues.push({
      checker: 'completeness',
      severity: 'WARNING',
      message: `${report.label} listed ${rendered} of ${report.computed} item(s)`,
      target: report.path,
      penalty: PENALTIES.incomplete,
    });
    result.corrections.push(`Re-rendered ${report.path} with all ${report.computed} item(s)`);
    result.penalty += PENALTIES.incomplete;
  }

  return result;
}

const DiagramFile = z.object({ source: z.string() });

export function checkDiagramSpecificity(state: ValidationState): CheckResult {
  const result = emptyResult();

  for (const kind of DIAGRAM_KINDS) {
    const regenerated = synthesizeDiagram(kind, state.decisions);
    if (regenerated.technologies.length === 0) continue;

    const path = diagramPath(kind);
    let source = '';
    try {
      const parsed = DiagramFile.safeParse(state.renderer.read(path));
      source = parsed.success ? parsed.data.source : '';
    } catch {
      source = '';
    }

    const referenced = regenerated.technologies.some((name) => source.includes(escapeLabel(name)));
    if (referenced) continue;

    replaceArtifact(state, state.renderer.renderDiagram(regenerated));

    result.issues.push({
      checker: 'diagram-specificity',
      severity: 'WARNING',
      message: `Diagram ${kind} referenced none of the detected technologies`,
      target: path,
      penalty: PENALTIES.diagram,
    });
    result.corrections.push(`Regenerated ${path}`);
    result.penalty += PENALTIES.diagram;
  }

  return result;
}

export function checkArtifactPresence(state: ValidationState): CheckResult {
  const result = emptyResult();

  for (const path of requiredArtifacts(state)) {
    if (state.renderer.exists(path)) continue;
    result.issues.push({
      checker: 'artifact-presence',
      severity: 'CRITICAL',
      message: `Required artifact ${path} is missing`,
      target: path,
      penalty: PENALTIES.missing,
    });
    result.penalty += PENALTIES.missing;
  }

  return result;
}

export function checkSerialization(state: ValidationState): CheckResult {
  const result = emptyResult();

  for (const artifact of state.artifacts) {
    if (artifact.ok) continue;
    result.issues.push({
      checker: 'serialization',
      severity: 'CRITICAL',
      message: artifact.error?.message ?? `${artifact.path} could not be serialized`,
      target: artifact.path,
      penalty: PENALTIES.serialization,
    });
    result.penalty += PENALTIES.serialization;
  }

  return result;
}

export function checkAnalyzerFailures(state: ValidationState): CheckResult {
  const result = emptyResult();
  const { diagrams, threats, debt } = state.analyzers;

  for (const outcome of [diagrams, threats, debt]) {
    if (!outcome || outcome.status !== 'failed') continue;
    result.issues.push({
      checker: 'analyzer-failure',
      severity: 'WARNING',
      message: outcome.error?.message ?? `${outcome.name} failed`,
      target: outcome.name,
      penalty: PENALTIES.analyzer,
    });
    result.penalty += PENALTIES.analyzer;
  }

  return result;
}

export function checkLowConfidence(state: ValidationState): CheckResult {
  const result = emptyResult();

  for (const { record } of state.decisions) {
    if (record.status === 'REMOVED' || record.confidenceLevel !== 'low') continue;
    result.issues.push({
      checker: 'low-confidence',
      severity: 'INFO',
      message: `${record.id} (${record.technologyName}) has low confidence (${record.confidence.toFixed(2)}) and needs manual review`,
      target: record.id,
      penalty: 0,
    });
  }

  return result;
}

/**
 * Files a complete run must leave on disk. Skipped analyzers have none.
 */
export function requiredArtifacts(state: Pick<ValidationState, 'decisions' | 'stored' | 'analyzers'>): string[] {
  const paths = state.decisions
    .filter((d) => d.record.status !== 'REMOVED')
    .map((d) => decisionPath(d.record));
  paths.push(...state.stored.map(decisionPath));
  paths.push(...DIAGRAM_KINDS.map(diagramPath));
  if (state.analyzers.threats) paths.push(THREAT_MODEL_PATH);
  if (state.analyzers.debt) paths.push(TECH_DEBT_PATH);
  return paths;
}

function emptyResult(): CheckResult {
  return { issues: [], corrections: [], penalty: 0 };
}

function replaceArtifact(state: ValidationState, artifact: RenderedArtifact): void {
  state.artifacts = [...state.artifacts.filter((a) => a.path !== artifact.path), artifact];
}

function countItems<T>(parsed: z.SafeParseReturnType<unknown, T>, count: (data: T) => number): number {
  return parsed.success ? count(parsed.data) : 0;
}
