/**
 * ASCII card renderer for run results
 * Creates a screenshot-friendly summary card
 */

import chalk from 'chalk';
import { Recommendation } from '../../types.js';

export interface DecisionBreakdown {
  new: number;
  enrichment: number;
  duplicate: number;
  removed: number;
}

export interface RunMeta {
  repoName: string;
  duration: number; // ms
  filesScanned: number;
  attempts: number;
}

export interface CardData {
  meta: RunMeta;
  verdict: Recommendation;
  score: number;
  decisions: DecisionBreakdown;
  threats?: { total: number; critical: number };
  debt?: { total: number; hours: number };
  outputDir: string;
  persisted: boolean;
}

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeRight: '├',
  teeLeft: '┤',
};

function line(char: string, width: number): string {
  return char.repeat(width);
}

function padRight(str: string, width: number): string {
  // Strip ANSI codes for length calculation
  // eslint-disable-next-line no-control-regex
  const stripped = str.replace(/\u001b\[\d+(;\d+)*m/g, '');
  const padding = Math.max(0, width - stripped.length);
  return str + ' '.repeat(padding);
}

function row(content: string, width: number): string {
  return BOX.vertical + '  ' + padRight(content, width - 4) + '  ' + BOX.vertical;
}

function divider(width: number): string {
  return BOX.teeRight + line(BOX.horizontal, width) + BOX.teeLeft;
}

function topBorder(width: number): string {
  return BOX.topLeft + line(BOX.horizontal, width) + BOX.topRight;
}

function bottomBorder(width: number): string {
  return BOX.bottomLeft + line(BOX.horizontal, width) + BOX.bottomRight;
}

function verdictColor(verdict: Recommendation): (s: string) => string {
  const colors: Record<Recommendation, (s: string) => string> = {
    ACCEPT: chalk.green,
    REVIEW: chalk.yellow,
    REJECT: chalk.red,
  };
  return colors[verdict];
}

function formatNumber(n: number): string {
  return String(n).padStart(3);
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

/**
 * Render a run result card
 *
 * ┌─────────────────────────────────────────────────────────────┐
 * │  ARCHSCRY IMPORT COMPLETE                                   │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Repository    my-project                                   │
 * │  Duration      42s                                          │
 * │  Files         116 files                                    │
 * │  Verdict       ACCEPT (0.95)                                │
 * ├─────────────────────────────────────────────────────────────┤
 * │  DECISIONS                     FINDINGS                     │
 * │  ● New          4              ● Threats      3 (1 crit.)   │
 * │  ● Enriched     1              ● Debt items  12 (19h)       │
 * │  ● Duplicate    2                                           │
 * │  ● Removed      0                                           │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Output: .archscry/output                                   │
 * └─────────────────────────────────────────────────────────────┘
 */
export function renderRunCard(data: CardData): string {
  const width = 61; // Inner width (excluding border chars)
  const lines: string[] = [];

  lines.push(topBorder(width));
  lines.push(row(chalk.bold.cyan('ARCHSCRY IMPORT COMPLETE'), width));
  lines.push(divider(width));

  const color = verdictColor(data.verdict);
  const attempts = data.meta.attempts > 1 ? chalk.dim(` after ${data.meta.attempts} runs`) : '';
  lines.push(row(`${chalk.dim('Repository')}    ${data.meta.repoName}`, width));
  lines.push(row(`${chalk.dim('Duration')}      ${formatDuration(data.meta.duration)}${attempts}`, width));
  lines.push(row(`${chalk.dim('Files')}         ${data.meta.filesScanned} files`, width));
  lines.push(row(`${chalk.dim('Verdict')}       ${color(data.verdict)} (${data.score.toFixed(2)})`, width));
  lines.push(divider(width));

  lines.push(row(`${chalk.bold('DECISIONS')}                     ${chalk.bold('FINDINGS')}`, width));

  const left = [
    `${chalk.green('●')} New        ${formatNumber(data.decisions.new)}`,
    `${chalk.blue('●')} Enriched   ${formatNumber(data.decisions.enrichment)}`,
    `${chalk.dim('●')} Duplicate  ${formatNumber(data.decisions.duplicate)}`,
    `${chalk.red('●')} Removed    ${formatNumber(data.decisions.removed)}`,
  ];
  const right = [
    data.threats
      ? `${chalk.red('●')} Threats    ${formatNumber(data.threats.total)} (${data.threats.critical} crit.)`
      : chalk.dim('  Threat model skipped'),
    data.debt
      ? `${chalk.yellow('●')} Debt items ${formatNumber(data.debt.total)} (${Math.round(data.debt.hours)}h)`
      : chalk.dim('  Debt report skipped'),
    '',
    '',
  ];
  for (let i = 0; i < left.length; i++) {
    lines.push(row(`${padRight(left[i], 30)}${right[i]}`, width));
  }
  lines.push(divider(width));

  lines.push(row(`${chalk.dim('Output:')} ${chalk.cyan(data.outputDir)}`, width));
  if (!data.persisted) {
    lines.push(row(chalk.dim('Decision store left unchanged'), width));
  }
  lines.push(bottomBorder(width));

  return lines.join('\n');
}

/**
 * Render a minimal status card (for the status command)
 */
export function renderStatusCard(
  repoName: string,
  provider: string,
  totalDecisions: number,
  byCategory: Record<string, number>,
  lastUpdated?: string
): string {
  const width = 45;
  const lines: string[] = [];

  lines.push(topBorder(width));
  lines.push(row(chalk.bold.cyan('ARCHSCRY STATUS'), width));
  lines.push(divider(width));
  lines.push(row(`${chalk.dim('Repository')}  ${repoName}`, width));
  lines.push(row(`${chalk.dim('Provider')}    ${provider}`, width));
  if (lastUpdated) {
    lines.push(row(`${chalk.dim('Updated')}     ${lastUpdated}`, width));
  }
  lines.push(divider(width));
  lines.push(row(`${chalk.bold('Decisions:')}  ${totalDecisions}`, width));
  for (const [category, count] of Object.entries(byCategory).sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(row(`  ${chalk.dim(category.padEnd(16))} ${formatNumber(count)}`, width));
  }
  lines.push(bottomBorder(width));

  return lines.join('\n');
}
