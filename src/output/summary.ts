/**
 * Human-readable run summary (reports/summary.md)
 *
 * Written after validation, so it can say which issues drove the score
 * down and which corrections were already applied.
 */

import { DebtItem, QualityReport, ThreatFinding } from '../types.js';
import { ReconciledDecision } from '../core/reconciler.js';
import { isCriticalThreat } from '../core/analyzers/threat-modeler.js';

export interface SummaryInput {
  root: string;
  timestamp: string;
  filesScanned: number;
  decisions: ReconciledDecision[];
  threats?: ThreatFinding[];
  debt?: DebtItem[];
  quality: QualityReport;
}

const VERDICT_ICON = {
  ACCEPT: '🟢',
  REVIEW: '🟡',
  REJECT: '🔴',
} as const;

const LEVEL_ICON = {
  high: '🟢',
  medium: '🟡',
  low: '⚪',
} as const;

export function formatSummaryMarkdown(input: SummaryInput): string {
  const { quality } = input;
  const sections: string[] = [];

  sections.push(`# Architecture import summary

> ${input.root} analyzed on ${new Date(input.timestamp).toLocaleDateString()}
> **${input.filesScanned} files scanned**, **${activeDecisions(input.decisions).length} decisions** inferred

## ${VERDICT_ICON[quality.recommendation]} Verdict: ${quality.recommendation}

Quality score: **${quality.score.toFixed(2)}**`);

  sections.push(formatDecisions(input.decisions));

  if (input.threats) {
    sections.push(formatThreats(input.threats));
  }
  if (input.debt) {
    sections.push(formatDebt(input.debt));
  }

  sections.push(formatIssues(quality));

  return sections.join('\n\n') + '\n';
}

function activeDecisions(decisions: ReconciledDecision[]): ReconciledDecision[] {
  return decisions.filter((d) => d.record.status !== 'REMOVED');
}

function formatDecisions(decisions: ReconciledDecision[]): string {
  if (decisions.length === 0) {
    return '## Decisions\n\nNo technologies were detected.';
  }

  const rows = decisions.map(({ record }) => {
    const icon = LEVEL_ICON[record.confidenceLevel];
    return `| ${record.id} | ${escapeCell(record.title)} | ${record.status} | ${icon} ${record.confidence.toFixed(2)} |`;
  });

  return `## Decisions

| ID | Decision | Status | Confidence |
|----|----------|--------|------------|
${rows.join('\n')}`;
}

function formatThreats(threats: ThreatFinding[]): string {
  if (threats.length === 0) {
    return '## Threats\n\nNo threats identified.';
  }

  const critical = threats.filter(isCriticalThreat).length;
  const lines = threats.map(
    (t) => `- ${t.escalate ? '🔴' : '🟠'} **${t.id}** ${escapeInline(t.title)} (${t.strideCategory}, severity ${t.severity.toFixed(1)})`
  );

  return `## Threats

${threats.length} finding(s), ${critical} critical.

${lines.join('\n')}`;
}

function formatDebt(items: DebtItem[]): string {
  if (items.length === 0) {
    return '## Technical debt\n\nNo debt items found.';
  }

  const hours = items.reduce((sum, i) => sum + i.effortEstimateHours, 0);
  const byPriority = (['P0', 'P1', 'P2', 'P3'] as const)
    .map((p) => `| ${p} | ${items.filter((i) => i.priority === p).length} |`)
    .join('\n');

  return `## Technical debt

${items.length} item(s), about ${Math.round(hours)} hour(s) of work.

| Priority | Count |
|----------|-------|
${byPriority}`;
}

function formatIssues(quality: QualityReport): string {
  const scored = quality.issues.filter((i) => i.severity !== 'INFO');
  const info = quality.issues.filter((i) => i.severity === 'INFO');
  const parts: string[] = ['## Quality issues'];

  if (scored.length === 0) {
    parts.push('No issues lowered the score.');
  } else {
    parts.push(
      scored
        .map((i) => `- **${i.severity}** [${i.checker}] ${escapeInline(i.message)} (−${i.penalty.toFixed(2)})`)
        .join('\n')
    );
  }

  if (quality.correctionsApplied.length > 0) {
    parts.push(`### Corrections applied\n\n${quality.correctionsApplied.map((c) => `- ${escapeInline(c)}`).join('\n')}`);
  }

  if (info.length > 0) {
    parts.push(`### Needs manual review\n\n${info.map((i) => `- ${escapeInline(i.message)}`).join('\n')}`);
  }

  return parts.join('\n\n');
}

function escapeCell(text: string): string {
  return escapeInline(text).replace(/\|/g, '\\|');
}

function escapeInline(text: string): string {
  return text.replace(/([*_`])/g, '\\$1');
}
