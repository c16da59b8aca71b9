/**
 * Artifact Renderer
 *
 * Every structured artifact is built as a plain object and handed to the
 * YAML serializer; free text (rationale, narratives, descriptions) is
 * never spliced into YAML by hand. After writing, the file is read back
 * and parsed strictly; if the parse fails or differs from the source
 * object, that one artifact is marked failed and the rest are still
 * written.
 *
 * Layout under the output directory:
 *
 *   decisions/ADR-NNN-<slug>.yml
 *   security/threat-model.yml
 *   architecture/<diagram-id>.yml
 *   reports/tech-debt.yml
 *   reports/quality-report.yml
 *   reports/summary.md
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { isDeepStrictEqual } from 'util';
import YAML from 'yaml';
import { DecisionRecord, Diagram, QualityReport } from '../types.js';
import { ReconciledDecision } from '../core/reconciler.js';
import { DebtArtifact, DiagramArtifact, ThreatModelArtifact } from '../core/analyzers/index.js';
import { DIAGRAM_KINDS, DiagramKind } from '../core/analyzers/diagram-synthesizer.js';
import { isCriticalThreat } from '../core/analyzers/threat-modeler.js';
import { SerializationError, describeError } from '../core/errors.js';

export const OUTPUT_DIRS = {
  decisions: 'decisions',
  security: 'security',
  architecture: 'architecture',
  reports: 'reports',
} as const;

export const THREAT_MODEL_PATH = `${OUTPUT_DIRS.security}/threat-model.yml`;
export const TECH_DEBT_PATH = `${OUTPUT_DIRS.reports}/tech-debt.yml`;
export const QUALITY_REPORT_PATH = `${OUTPUT_DIRS.reports}/quality-report.yml`;
export const SUMMARY_PATH = `${OUTPUT_DIRS.reports}/summary.md`;

export type ArtifactKind = 'decision' | 'threat-model' | 'diagram' | 'tech-debt' | 'quality-report' | 'summary';

export interface RenderedArtifact {
  kind: ArtifactKind;
  // Relative to the output directory, forward slashes
  path: string;
  ok: boolean;
  // Decision or diagram id the file belongs to
  target?: string;
  // Number of list items written (threats, debt items)
  itemCount?: number;
  error?: SerializationError;
}

export type Serialize = (value: unknown) => string;

export const serializeYaml: Serialize = (value) => YAML.stringify(value, { lineWidth: 0 });

export interface RenderInput {
  decisions: ReconciledDecision[];
  // Persisted records this run did not re-derive; their files are kept
  stored?: DecisionRecord[];
  diagrams: DiagramArtifact;
  threats?: ThreatModelArtifact;
  debt?: DebtArtifact;
}

export function decisionPath(record: DecisionRecord): string {
  return `${OUTPUT_DIRS.decisions}/${record.id}-${slugify(record.title)}.yml`;
}

export function diagramPath(id: string): string {
  return `${OUTPUT_DIRS.architecture}/${id}.yml`;
}

export function slugify(text: string): string {
  return (
    text
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '')
      .slice(0, 60) || 'decision'
  );
}

export class ArtifactRenderer {
  constructor(
    readonly outputDir: string,
    private readonly serialize: Serialize = serializeYaml
  ) {}

  /**
   * Clear the directories this renderer owns so no file from an earlier
   * run is mistaken for output of this one
   */
  prepare(): void {
    for (const dir of Object.values(OUTPUT_DIRS)) {
      rmSync(join(this.outputDir, dir), { recursive: true, force: true });
    }
    mkdirSync(this.outputDir, { recursive: true });
  }

  renderAll(input: RenderInput): RenderedArtifact[] {
    const artifacts = input.decisions
      .filter((d) => d.record.status !== 'REMOVED')
      .map((d) => this.renderDecision(d));
    for (const record of input.stored ?? []) {
      artifacts.push(this.renderDecision({ record, evidence: [] }));
    }

    artifacts.push(...this.renderDiagrams(input.diagrams));
    if (input.threats) artifacts.push(this.renderThreatModel(input.threats));
    if (input.debt) artifacts.push(this.renderDebtReport(input.debt));
    return artifacts;
  }

  renderDecision(decision: ReconciledDecision): RenderedArtifact {
    const { record } = decision;
    const document = {
      id: record.id,
      title: record.title,
      status: record.status,
      category: record.category,
      technology: { id: record.technologyId, name: record.technologyName },
      confidence: record.confidence,
      confidenceLevel: record.confidenceLevel,
      synthesis: record.synthesis,
      rationale: record.rationale,
      narrative: record.narrative,
      evidence: record.evidenceRefs,
      supersedes: record.supersedes,
      createdAt: record.createdAt,
    };
    return this.writeStructured('decision', decisionPath(record), document, { target: record.id });
  }

  /**
   * One file per diagram kind. A failed synthesizer still gets its
   * files, empty and flagged.
   */
  renderDiagrams(artifact: DiagramArtifact): RenderedArtifact[] {
    return DIAGRAM_KINDS.map((kind) => {
      const diagram = artifact.diagrams.find((d) => d.kind === kind);
      return diagram ? this.renderDiagram(diagram) : this.renderFailedDiagram(kind, artifact.error);
    });
  }

  renderDiagram(diagram: Diagram): RenderedArtifact {
    const document = {
      id: diagram.id,
      title: diagram.title,
      kind: diagram.kind,
      format: 'mermaid',
      technologies: diagram.technologies,
      nodes: diagram.nodes,
      edges: diagram.edges,
      source: diagram.mermaid,
    };
    return this.writeStructured('diagram', diagramPath(diagram.id), document, { target: diagram.id });
  }

  renderThreatModel(artifact: ThreatModelArtifact): RenderedArtifact {
    const threats = artifact.threats;
    const document = {
      ...failureFields(artifact),
      summary: {
        total: threats.length,
        critical: threats.filter(isCriticalThreat).length,
        escalated: threats.filter((t) => t.escalate).length,
      },
      threats: threats.map((t) => ({
        id: t.id,
        title: t.title,
        stride: t.strideCategory,
        severity: t.severity,
        escalate: t.escalate,
        description: t.description,
        mitigation: t.mitigation,
        evidence: t.evidenceRefs,
      })),
    };
    return this.writeStructured('threat-model', THREAT_MODEL_PATH, document, { itemCount: threats.length });
  }

  renderDebtReport(artifact: DebtArtifact): RenderedArtifact {
    const items = artifact.items;
    const byPriority: Record<string, number> = { P0: 0, P1: 0, P2: 0, P3: 0 };
    for (const item of items) byPriority[item.priority]++;

    const document = {
      ...failureFields(artifact),
      summary: {
        total: items.length,
        byPriority,
        effortEstimateHours: Math.round(items.reduce((sum, i) => sum + i.effortEstimateHours, 0) * 100) / 100,
      },
      items,
    };
    return this.writeStructured('tech-debt', TECH_DEBT_PATH, document, { itemCount: items.length });
  }

  renderQualityReport(report: QualityReport): RenderedArtifact {
    return this.writeStructured('quality-report', QUALITY_REPORT_PATH, report, {});
  }

  renderSummary(markdown: string): RenderedArtifact {
    try {
      this.writeText(SUMMARY_PATH, markdown);
      return { kind: 'summary', path: SUMMARY_PATH, ok: true };
    } catch (error) {
      return {
        kind: 'summary',
        path: SUMMARY_PATH,
        ok: false,
        error: new SerializationError(SUMMARY_PATH, describeError(error)),
      };
    }
  }

  remove(path: string): void {
    rmSync(this.resolve(path), { force: true });
  }

  exists(path: string): boolean {
    return existsSync(this.resolve(path));
  }

  /**
   * Parse an artifact back from disk, strictly
   */
  read(path: string): unknown {
    return YAML.parse(readFileSync(this.resolve(path), 'utf-8'), { strict: true, uniqueKeys: true });
  }

  resolve(path: string): string {
    return join(this.outputDir, path);
  }

  private renderFailedDiagram(kind: DiagramKind, error: string | undefined): RenderedArtifact {
    const document = {
      id: kind,
      kind,
      failed: true,
      error: error ?? 'diagram synthesis failed',
      format: 'mermaid',
      technologies: [],
      nodes: [],
      edges: [],
      source: '',
    };
    return this.writeStructured('diagram', diagramPath(kind), document, { target: kind });
  }

  private writeStructured(
    kind: ArtifactKind,
    path: string,
    document: object,
    extra: Pick<RenderedArtifact, 'target' | 'itemCount'>
  ): RenderedArtifact {
    try {
      const expected = normalize(document);
      this.writeText(path, this.serialize(expected));
      verifyRoundTrip(path, this.read(path), expected);
      return { kind, path, ok: true, ...extra };
    } catch (error) {
      const serializationError =
        error instanceof SerializationError ? error : new SerializationError(path, describeError(error));
      return { kind, path, ok: false, error: serializationError, ...extra };
    }
  }

  private writeText(path: string, text: string): void {
    const absolute = this.resolve(path);
    mkdirSync(dirname(absolute), { recursive: true });
    writeFileSync(absolute, text);
  }
}

function failureFields(artifact: { failed?: boolean; error?: string }): { failed?: true; error?: string } {
  return artifact.failed ? { failed: true, error: artifact.error ?? 'analyzer failed' } : {};
}

/**
 * Plain JSON-compatible copy: undefined fields dropped, so the parsed
 * file and the source object are comparable
 */
function normalize(document: object): unknown {
  return JSON.parse(JSON.stringify(document));
}

function verifyRoundTrip(path: string, parsed: unknown, expected: unknown): void {
  if (!isDeepStrictEqual(parsed, expected)) {
    throw new SerializationError(path, 'parsed content differs from the rendered data');
  }
}
