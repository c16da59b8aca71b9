/**
 * Decision Extractor
 *
 * Groups evidence by category and technology and synthesizes one
 * candidate decision per technology with enough evidence.
 *
 * Rationale synthesis has two modes with one output shape. Template
 * mode produces the skeleton below. Narrative mode produces the same
 * skeleton plus a separate elaboration; the rationale itself never
 * varies by mode, so rationale similarity in the reconciler behaves the
 * same for both.
 */

import { DecisionCategory, Evidence, SynthesisMode, TechnologySignature } from '../types.js';
import { NarrativeSynthesizer } from './narrative.js';
import { SynthesisFailure, describeError } from './errors.js';

export interface DecisionDraft {
  id: string;
  title: string;
  category: DecisionCategory;
  technologyId: string;
  technologyName: string;
  rationale: string;
  narrative?: string;
  synthesis: SynthesisMode;
  evidence: Evidence[];
  evidenceRefs: string[];
}

export interface ExtractorOptions {
  minEvidence: number;
  // Numeric part of the first id to hand out (ADR-<startId>)
  startId: number;
  narrative?: NarrativeSynthesizer;
}

export interface ExtractorProgress {
  onWarning?: (message: string) => void;
  onProgress?: (message: string) => void;
}

const MAX_LISTED_FILES = 10;

/**
 * Deterministic rationale skeleton. Byte-identical for identical evidence.
 */
export function buildRationale(technologyName: string, category: DecisionCategory, evidence: Evidence[]): string {
  const files = uniqueSorted(evidence.map((e) => e.filePath));
  const n = files.length;
  const listed = files.slice(0, MAX_LISTED_FILES).join(', ');
  const more = n > MAX_LISTED_FILES ? ` and ${n - MAX_LISTED_FILES} more` : '';
  const references = evidence.length;

  return `${technologyName} was detected as the ${category} solution based on evidence in ${n} file(s): ${listed}${more}. ` +
    `${references} reference(s) found, indicating it is the adopted technology for this concern.`;
}

export function formatDecisionId(n: number): string {
  return `ADR-${String(n).padStart(3, '0')}`;
}

export function parseDecisionNumber(id: string): number | null {
  const match = id.match(/^ADR-(\d+)$/);
  return match ? parseInt(match[1], 10) : null;
}

export function toEvidenceRef(evidence: Evidence): string {
  return evidence.filePath;
}

export async function extractDecisions(
  evidence: Evidence[],
  signatures: TechnologySignature[],
  options: ExtractorOptions,
  progress: ExtractorProgress = {}
): Promise<DecisionDraft[]> {
  const names = new Map(signatures.map((s) => [s.id, s.name]));
  const groups = groupEvidence(evidence);
  const drafts: DecisionDraft[] = [];

  const narrative = options.narrative ? await usableNarrative(options.narrative, progress) : undefined;

  let nextId = options.startId;

  for (const group of groups) {
    if (group.evidence.length < options.minEvidence) {
      continue;
    }

    const technologyName = names.get(group.technologyId) ?? group.technologyId;
    const rationale = buildRationale(technologyName, group.category, group.evidence);
    let elaboration: string | undefined;

    if (narrative) {
      try {
        elaboration = await narrative.elaborate({
          technologyName,
          category: group.category,
          skeleton: rationale,
          evidence: group.evidence,
        });
      } catch (error) {
        const reason = error instanceof SynthesisFailure ? error.message : describeError(error);
        progress.onWarning?.(`Narrative synthesis failed for ${technologyName}, using template: ${reason}`);
      }
    }

    drafts.push({
      id: formatDecisionId(nextId++),
      title: `Use ${technologyName} for ${group.category}`,
      category: group.category,
      technologyId: group.technologyId,
      technologyName,
      rationale,
      ...(elaboration ? { narrative: elaboration } : {}),
      synthesis: elaboration ? 'narrative' : 'template',
      evidence: group.evidence,
      evidenceRefs: uniqueSorted(group.evidence.map(toEvidenceRef)),
    });

    progress.onProgress?.(`  ${technologyName} (${group.category}): ${group.evidence.length} evidence`);
  }

  return drafts;
}

/**
 * The synthesizer if its provider answers the availability check, else
 * undefined so the run continues in template mode
 */
async function usableNarrative(
  narrative: NarrativeSynthesizer,
  progress: ExtractorProgress
): Promise<NarrativeSynthesizer | undefined> {
  let available: boolean;
  try {
    available = await narrative.isAvailable();
  } catch (error) {
    progress.onWarning?.(
      `Narrative synthesis unavailable (${narrative.providerName}: ${describeError(error)}); using template mode`
    );
    return undefined;
  }

  if (!available) {
    progress.onWarning?.(`Narrative synthesis unavailable (${narrative.providerName}); using template mode`);
    return undefined;
  }
  return narrative;
}

interface EvidenceGroup {
  category: DecisionCategory;
  technologyId: string;
  evidence: Evidence[];
}

/**
 * Group by category, then technology. Categories follow their declared
 * order, technologies are sorted by id.
 */
function groupEvidence(evidence: Evidence[]): EvidenceGroup[] {
  const groups = new Map<string, EvidenceGroup>();

  for (const item of evidence) {
    const key = `${item.category}::${item.technologyId}`;
    const group = groups.get(key);
    if (group) {
      group.evidence.push(item);
    } else {
      groups.set(key, { category: item.category, technologyId: item.technologyId, evidence: [item] });
    }
  }

  const categoryOrder = DecisionCategory.options;
  return [...groups.values()].sort(
    (a, b) =>
      categoryOrder.indexOf(a.category) - categoryOrder.indexOf(b.category) ||
      a.technologyId.localeCompare(b.technologyId)
  );
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}
