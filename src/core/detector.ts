/**
 * Technology Detector
 *
 * Every file is tried against every signature's path patterns; on a
 * path hit the (bounded) content is scanned line by line for the
 * signature's content patterns. Signatures carrying disambiguators are
 * rejected unless at least one of them holds, so a shared filename or
 * extension never reads as several unrelated technologies.
 *
 * No pipeline logic is technology-specific: adding a technology is a
 * registry change.
 */

import { Evidence, FileInventory, InventoryFile } from '../types.js';
import { CompiledSignature } from './signatures.js';
import { ContentReader } from './content-reader.js';
import { EvidenceReadError } from './errors.js';

export interface DetectionResult {
  evidence: Evidence[];
  unreadable: EvidenceReadError[];
}

export interface DetectionProgress {
  onWarning?: (message: string) => void;
}

export function detectTechnologies(
  inventory: FileInventory,
  signatures: CompiledSignature[],
  reader: ContentReader,
  progress: DetectionProgress = {}
): DetectionResult {
  const byKey = new Map<string, Evidence>();
  const unreadable: EvidenceReadError[] = [];
  const allPaths = inventory.files.map((f) => f.path);

  for (const file of inventory.files) {
    const candidates = signatures.filter((s) => s.matchesPath(file.path));
    if (candidates.length === 0) {
      continue;
    }

    let lines: string[] | null = null;
    const needsContent = candidates.some(
      (s) => s.contentPatterns.length > 0 || s.disambiguators.some((d) => d.type === 'token')
    );

    if (needsContent) {
      const outcome = reader.read(file);
      if (!outcome.success) {
        unreadable.push(outcome.error);
        progress.onWarning?.(outcome.error.message);
        continue;
      }
      lines = outcome.data.split(/\r?\n/);
    }

    for (const compiled of candidates) {
      const evidence = matchSignature(compiled, file, lines, allPaths);
      if (evidence) {
        keepStrongest(byKey, evidence);
      }
    }
  }

  return {
    evidence: [...byKey.values()].sort(compareEvidence),
    unreadable,
  };
}

/**
 * Match one signature against one path-matched file
 */
export function matchSignature(
  compiled: CompiledSignature,
  file: InventoryFile,
  lines: string[] | null,
  allPaths: string[]
): Evidence | null {
  const { signature } = compiled;
  let lineRef: number | undefined;

  if (compiled.contentPatterns.length > 0 && lines) {
    lineRef = findFirstLine(lines, compiled.contentPatterns);
  }

  const contentHit = lineRef !== undefined;
  if (!contentHit && !(signature.pathOnly || compiled.contentPatterns.length === 0)) {
    return null;
  }

  if (!disambiguatorHolds(compiled, lines, allPaths)) {
    return null;
  }

  return {
    technologyId: signature.id,
    category: signature.category,
    filePath: file.path,
    ...(lineRef !== undefined ? { lineRef } : {}),
    matchStrength: contentHit ? 'content' : 'path',
  };
}

function findFirstLine(lines: string[], patterns: RegExp[]): number | undefined {
  for (let i = 0; i < lines.length; i++) {
    if (patterns.some((pattern) => pattern.test(lines[i]))) {
      return i + 1;
    }
  }
  return undefined;
}

function disambiguatorHolds(
  compiled: CompiledSignature,
  lines: string[] | null,
  allPaths: string[]
): boolean {
  if (compiled.disambiguators.length === 0) {
    return true;
  }

  return compiled.disambiguators.some((d) => {
    if (d.type === 'marker') {
      return allPaths.some((path) => d.matches(path));
    }
    const token = d.token.toLowerCase();
    return lines !== null && lines.some((line) => line.toLowerCase().includes(token));
  });
}

function keepStrongest(byKey: Map<string, Evidence>, evidence: Evidence): void {
  const key = `${evidence.technologyId}::${evidence.filePath}`;
  const existing = byKey.get(key);
  if (!existing || (existing.matchStrength === 'path' && evidence.matchStrength === 'content')) {
    byKey.set(key, evidence);
  }
}

function compareEvidence(a: Evidence, b: Evidence): number {
  return a.technologyId.localeCompare(b.technologyId) || a.filePath.localeCompare(b.filePath);
}
