/**
 * Decision Reconciler
 *
 * Classifies each candidate against the persisted store:
 *
 * - identity match on (category, technologyId), else
 * - same-category rationale similarity >= threshold, only against
 *   persisted records whose technology id the registry no longer knows
 *   (a renamed or retired signature)
 *
 * No match is NEW. A match whose evidence is already covered by the
 * persisted record is DUPLICATE. A match bringing new evidence is
 * ENRICHMENT: a fresh record that supersedes the persisted one under
 * the same id, carrying the union of evidence refs.
 *
 * A candidate for a technology the registry still knows is never folded
 * into a record of another technology, however alike the two rationales
 * read.
 *
 * The persisted store is only ever added to. Records are never removed
 * and persisted objects are never modified.
 */

import { DecisionRecord, Evidence } from '../types.js';
import { DecisionStoreFile, highestDecisionNumber } from './decision-store.js';
import { ScoredDecision } from './scorer.js';
import { formatDecisionId } from './extractor.js';

export type MatchKind = 'identity' | 'similarity';

/**
 * A run-local decision: the record plus the evidence it was derived from
 */
export interface ReconciledDecision {
  record: DecisionRecord;
  evidence: Evidence[];
  matchedBy?: MatchKind;
  similarity?: number;
}

export interface ReconcileOptions {
  similarityThreshold: number;
  // Technology ids of the current signature registry
  liveTechnologyIds: ReadonlySet<string>;
  now?: Date;
}

export interface ReconcileSummary {
  newCount: number;
  duplicateCount: number;
  enrichmentCount: number;
}

const TOKEN_PATTERN = /[a-z0-9][a-z0-9._/-]*/g;
const TECH_MASK = '__tech__';

/**
 * Jaccard similarity over word tokens, each text with its own
 * technology name masked
 */
export function rationaleSimilarity(a: string, aName: string, b: string, bName: string): number {
  const left = tokenize(maskName(a, aName));
  const right = tokenize(maskName(b, bName));
  if (left.size === 0 && right.size === 0) {
    return 1;
  }

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export function reconcile(
  candidates: ScoredDecision[],
  store: DecisionStoreFile,
  options: ReconcileOptions
): ReconciledDecision[] {
  const createdAt = (options.now ?? new Date()).toISOString();
  let nextNumber = highestDecisionNumber(store) + 1;

  // Persisted records this run re-derives by identity are not open to
  // similarity matches; each persisted record is superseded at most once.
  const claimed = new Set(
    store.decisions
      .filter((p) => candidates.some((c) => c.category === p.category && c.technologyId === p.technologyId))
      .map((p) => p.id)
  );

  return candidates.map((candidate): ReconciledDecision => {
    const match = findMatch(candidate, store.decisions, options, claimed);
    if (match?.kind === 'similarity') {
      claimed.add(match.persisted.id);
    }

    if (!match) {
      return {
        record: toRecord(candidate, formatDecisionId(nextNumber++), 'NEW', createdAt),
        evidence: candidate.evidence,
      };
    }

    const { persisted, kind, similarity } = match;
    const known = new Set(persisted.evidenceRefs);
    const added = candidate.evidenceRefs.filter((ref) => !known.has(ref));

    if (added.length === 0) {
      return {
        record: toRecord(candidate, persisted.id, 'DUPLICATE', createdAt),
        evidence: candidate.evidence,
        matchedBy: kind,
        similarity,
      };
    }

    // Identity matches describe the same technology and take the fresh
    // text; similarity matches keep the persisted identity and text.
    const base: DecisionRecord =
      kind === 'identity'
        ? toRecord(candidate, persisted.id, 'ENRICHMENT', createdAt)
        : { ...persisted, status: 'ENRICHMENT', createdAt };

    return {
      record: {
        ...base,
        confidence: candidate.confidence,
        confidenceLevel: candidate.confidenceLevel,
        evidenceRefs: [...persisted.evidenceRefs, ...added],
        supersedes: persisted.id,
      },
      evidence: candidate.evidence,
      matchedBy: kind,
      similarity,
    };
  });
}

/**
 * Records of this run that would be written to the store
 */
export function persistableRecords(reconciled: ReconciledDecision[]): DecisionRecord[] {
  return reconciled
    .filter((d) => d.record.status === 'NEW' || d.record.status === 'ENRICHMENT')
    .map((d): DecisionRecord => ({ ...d.record, status: 'ACCEPTED' }));
}

/**
 * Records to write into the store as it is on disk now. The store may
 * have changed since this run reconciled against it:
 *
 * - an enrichment, or a NEW record whose technology is now recorded,
 *   extends the stored record's evidence (stored refs first);
 * - a NEW record whose id was taken meanwhile is renumbered after the
 *   highest stored id.
 *
 * Stored records not named here are left as they are.
 */
export function mergeAccepted(latest: DecisionStoreFile, reconciled: ReconciledDecision[]): DecisionRecord[] {
  const byId = new Map(latest.decisions.map((d) => [d.id, d]));
  const taken = new Set(byId.keys());
  let next = highestDecisionNumber(latest) + 1;
  const merged: DecisionRecord[] = [];

  for (const record of persistableRecords(reconciled)) {
    const stored =
      (record.supersedes !== undefined ? byId.get(record.supersedes) : undefined) ??
      latest.decisions.find((d) => d.category === record.category && d.technologyId === record.technologyId);

    if (stored) {
      const refs = unionRefs(stored.evidenceRefs, record.evidenceRefs);
      if (record.supersedes === undefined && refs.length === stored.evidenceRefs.length) {
        continue;
      }
      merged.push({ ...record, id: stored.id, supersedes: stored.id, evidenceRefs: refs });
      continue;
    }

    const id = taken.has(record.id) ? formatDecisionId(next++) : record.id;
    taken.add(id);
    merged.push({ ...record, id });
  }

  return merged;
}

/**
 * Persisted records this run did not re-derive
 */
export function carriedOver(store: DecisionStoreFile, reconciled: ReconciledDecision[]): DecisionRecord[] {
  const touched = new Set(reconciled.map((d) => d.record.id));
  return store.decisions.filter((d) => !touched.has(d.id));
}

export function summarize(reconciled: ReconciledDecision[]): ReconcileSummary {
  const count = (status: DecisionRecord['status']) =>
    reconciled.filter((d) => d.record.status === status).length;
  return {
    newCount: count('NEW'),
    duplicateCount: count('DUPLICATE'),
    enrichmentCount: count('ENRICHMENT'),
  };
}

interface StoreMatch {
  persisted: DecisionRecord;
  kind: MatchKind;
  similarity?: number;
}

function findMatch(
  candidate: ScoredDecision,
  persisted: DecisionRecord[],
  options: ReconcileOptions,
  claimed: Set<string>
): StoreMatch | null {
  const identity = persisted.find(
    (p) => p.category === candidate.category && p.technologyId === candidate.technologyId
  );
  if (identity) {
    return { persisted: identity, kind: 'identity' };
  }

  let best: StoreMatch | null = null;
  for (const p of persisted) {
    if (p.category !== candidate.category || claimed.has(p.id)) continue;
    if (options.liveTechnologyIds.has(p.technologyId)) continue;
    const similarity = rationaleSimilarity(candidate.rationale, candidate.technologyName, p.rationale, p.technologyName);
    if (similarity >= options.similarityThreshold && (!best || (best.similarity ?? 0) < similarity)) {
      best = { persisted: p, kind: 'similarity', similarity };
    }
  }
  return best;
}

function toRecord(
  candidate: ScoredDecision,
  id: string,
  status: DecisionRecord['status'],
  createdAt: string
): DecisionRecord {
  return {
    id,
    title: candidate.title,
    category: candidate.category,
    technologyId: candidate.technologyId,
    technologyName: candidate.technologyName,
    rationale: candidate.rationale,
    ...(candidate.narrative ? { narrative: candidate.narrative } : {}),
    synthesis: candidate.synthesis,
    confidence: candidate.confidence,
    confidenceLevel: candidate.confidenceLevel,
    evidenceRefs: candidate.evidenceRefs,
    status,
    createdAt,
  };
}

function unionRefs(stored: string[], incoming: string[]): string[] {
  return [...new Set([...stored, ...incoming])];
}

function maskName(text: string, name: string): string {
  if (!name) return text.toLowerCase();
  return text.toLowerCase().split(name.toLowerCase()).join(TECH_MASK);
}

function tokenize(text: string): Set<string> {
  return new Set(text.match(TOKEN_PATTERN) ?? []);
}
