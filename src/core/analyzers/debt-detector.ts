/**
 * Debt Detector
 *
 * Code-smell rules run line by line over production sources and are
 * reported once per file and rule. Dependency-age rules compare each
 * package.json range with the current major recorded in the signature
 * registry.
 */

import { basename } from 'path';
import { DebtCategory, DebtItem, DebtPriority, InventoryFile } from '../../types.js';
import { PackageJsonSchema, safeParseJson } from '../validation.js';
import type { AnalyzerInput, FailureFlag } from './index.js';
import { LineHit, LineRule, formatSequenceId, locationOf, scanLines } from './line-scan.js';

export interface DebtArtifact extends FailureFlag {
  items: DebtItem[];
}

interface DebtRule extends LineRule {
  label: string;
  priority: DebtPriority;
  category: DebtCategory;
  // Effort per occurrence
  hours: number;
}

const DEBT_RULES: DebtRule[] = [
  {
    id: 'fixme-marker',
    pattern: /\b(?:FIXME|HACK|XXX)\b/,
    label: 'FIXME/HACK marker(s)',
    priority: 'P2',
    category: 'workaround',
    hours: 1,
  },
  {
    id: 'todo-marker',
    pattern: /\bTODO\b/,
    label: 'TODO marker(s)',
    priority: 'P3',
    category: 'workaround',
    hours: 0.5,
  },
  {
    id: 'suppressed-check',
    pattern: /@ts-ignore|@ts-nocheck|eslint-disable|#\s*noqa|#\s*type:\s*ignore|@SuppressWarnings|#\s*pylint:\s*disable/,
    label: 'suppressed check(s)',
    priority: 'P2',
    category: 'suppressed-check',
    hours: 0.5,
  },
  {
    id: 'debug-leftover',
    pattern: /\bconsole\.log\s*\(|^\s*debugger;?\s*$/,
    label: 'debug statement(s)',
    priority: 'P3',
    category: 'debug-leftover',
    hours: 0.25,
  },
  {
    id: 'deprecated-usage',
    pattern: /@deprecated|\bDeprecationWarning\b|@Deprecated\b|\bnew Buffer\s*\(/,
    label: 'deprecated API use(s)',
    priority: 'P2',
    category: 'deprecated-usage',
    hours: 1,
  },
];

export const OVERSIZED_LINES = 500;
export const SEVERELY_OVERSIZED_LINES = 1000;

const UNPINNED_RANGES = new Set(['*', 'latest', 'x', '']);

export function detectDebt(input: AnalyzerInput): DebtArtifact {
  const items: Omit<DebtItem, 'id'>[] = [
    ...smellItems(input),
    ...sizeItems(input),
    ...dependencyItems(input),
  ];

  items.sort((a, b) => a.priority.localeCompare(b.priority) || a.location.localeCompare(b.location));

  return {
    items: items.map((item, i) => ({ id: formatSequenceId('TD', i + 1), ...item })),
  };
}

function smellItems(input: AnalyzerInput): Omit<DebtItem, 'id'>[] {
  const hits = scanLines(input.inventory, input.reader, ['source'], DEBT_RULES);
  const grouped = new Map<string, LineHit<DebtRule>[]>();

  for (const hit of hits) {
    const key = `${hit.rule.id}::${hit.file.path}`;
    grouped.set(key, [...(grouped.get(key) ?? []), hit]);
  }

  return [...grouped.values()].map((group) => {
    const { rule } = group[0];
    return {
      title: `${group.length} ${rule.label}`,
      priority: rule.priority,
      category: rule.category,
      location: locationOf(group[0]),
      effortEstimateHours: roundHours(rule.hours * group.length),
    };
  });
}

function sizeItems(input: AnalyzerInput): Omit<DebtItem, 'id'>[] {
  const items: Omit<DebtItem, 'id'>[] = [];

  for (const file of input.inventory.files) {
    if (file.kind !== 'source') continue;
    const lines = input.reader.lines(file);
    if (!lines || lines.length <= OVERSIZED_LINES) continue;

    items.push({
      title: `Oversized file (${lines.length} lines)`,
      priority: lines.length > SEVERELY_OVERSIZED_LINES ? 'P1' : 'P2',
      category: 'complexity',
      location: file.path,
      effortEstimateHours: Math.ceil(lines.length / 250),
    });
  }

  return items;
}

function dependencyItems(input: AnalyzerInput): Omit<DebtItem, 'id'>[] {
  const currentMajors = new Map<string, number>();
  for (const signature of input.signatures) {
    if (signature.npmPackage && signature.currentMajor !== undefined) {
      currentMajors.set(signature.npmPackage, signature.currentMajor);
    }
  }

  const items: Omit<DebtItem, 'id'>[] = [];
  for (const file of input.inventory.files) {
    if (basename(file.path) !== 'package.json' || file.kind !== 'config') continue;
    items.push(...manifestItems(file, input, currentMajors));
  }
  return items;
}

function manifestItems(
  file: InventoryFile,
  input: AnalyzerInput,
  currentMajors: Map<string, number>
): Omit<DebtItem, 'id'>[] {
  const outcome = input.reader.read(file);
  if (!outcome.success) return [];
  const parsed = safeParseJson(outcome.data, PackageJsonSchema);
  if (!parsed.success) return [];

  const ranges = { ...parsed.data.devDependencies, ...parsed.data.dependencies };
  const items: Omit<DebtItem, 'id'>[] = [];

  for (const [name, range] of Object.entries(ranges).sort(([a], [b]) => a.localeCompare(b))) {
    const location = `${file.path}#${name}`;
    const trimmed = range.trim();

    if (UNPINNED_RANGES.has(trimmed)) {
      items.push({
        title: `Unpinned dependency ${name} (${trimmed || 'empty range'})`,
        priority: 'P2',
        category: 'unpinned-dependency',
        location,
        effortEstimateHours: 1,
      });
      continue;
    }

    const current = currentMajors.get(name);
    const major = declaredMajor(trimmed);
    if (current === undefined || major === null) continue;

    const behind = current - major;
    if (behind >= 2) {
      items.push({
        title: `Outdated dependency ${name} ${trimmed} (current major ${current})`,
        priority: 'P1',
        category: 'outdated-dependency',
        location,
        effortEstimateHours: 8,
      });
    } else if (behind === 1) {
      items.push({
        title: `Outdated dependency ${name} ${trimmed} (current major ${current})`,
        priority: 'P2',
        category: 'outdated-dependency',
        location,
        effortEstimateHours: 4,
      });
    }
  }

  return items;
}

/**
 * Major version a semver range pins to, or null for ranges that name
 * no version (tags, urls, workspace refs)
 */
export function declaredMajor(range: string): number | null {
  const match = range.match(/^(?:[\^~]|[<>]=?|=)?\s*v?(\d+)(?:\.|$|\s)/);
  return match ? parseInt(match[1], 10) : null;
}

function roundHours(hours: number): number {
  return Math.round(hours * 100) / 100;
}
