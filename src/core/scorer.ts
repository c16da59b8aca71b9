/**
 * Confidence Scorer
 *
 * confidence = 0.4·quality + 0.3·quantity + 0.2·consistency + 0.1·synthesisBonus
 *
 * - quality:     content matches count 1, path-only matches 0.5
 * - quantity:    ln(1+n)/ln(1+SATURATION), capped at 1
 * - consistency: mean over the technology's evidence files of
 *                1 / (category families detected in that file)
 * - bonus:       1 when narrative synthesis succeeded
 */

import { ConfidenceLevel, DecisionCategory, Evidence } from '../types.js';
import { DecisionDraft } from './extractor.js';

export const WEIGHTS = {
  quality: 0.4,
  quantity: 0.3,
  consistency: 0.2,
  synthesisBonus: 0.1,
} as const;

export const QUANTITY_SATURATION = 5;

export const HIGH_CONFIDENCE = 0.8;
export const MEDIUM_CONFIDENCE = 0.5;

// Categories in the same family are related concerns, not spread
const CATEGORY_FAMILY: Record<DecisionCategory, string> = {
  language: 'language',
  framework: 'service',
  'api-style': 'service',
  auth: 'service',
  database: 'data',
  orm: 'data',
  caching: 'data',
  messaging: 'messaging',
  testing: 'quality',
  'build-tool': 'delivery',
  infrastructure: 'delivery',
  ci: 'delivery',
};

export interface ConfidenceBreakdown {
  quality: number;
  quantity: number;
  consistency: number;
  synthesisBonus: number;
  confidence: number;
}

export interface ScoredDecision extends DecisionDraft {
  confidence: number;
  confidenceLevel: ConfidenceLevel;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function levelFor(confidence: number): ConfidenceLevel {
  if (confidence >= HIGH_CONFIDENCE) return 'high';
  if (confidence >= MEDIUM_CONFIDENCE) return 'medium';
  return 'low';
}

export function evidenceQuality(evidence: Evidence[]): number {
  if (evidence.length === 0) return 0;
  const total = evidence.reduce((sum, e) => sum + (e.matchStrength === 'content' ? 1 : 0.5), 0);
  return clamp01(total / evidence.length);
}

export function evidenceQuantity(count: number): number {
  if (count <= 0) return 0;
  return clamp01(Math.log(1 + count) / Math.log(1 + QUANTITY_SATURATION));
}

/**
 * @param allEvidence the whole run's evidence, used to see what else each file evidences
 */
export function evidenceConsistency(evidence: Evidence[], allEvidence: Evidence[]): number {
  const files = [...new Set(evidence.map((e) => e.filePath))];
  if (files.length === 0) return 0;

  const familiesByFile = new Map<string, Set<string>>();
  for (const item of allEvidence) {
    if (item.category === 'language') continue;
    let families = familiesByFile.get(item.filePath);
    if (!families) {
      families = new Set();
      familiesByFile.set(item.filePath, families);
    }
    families.add(CATEGORY_FAMILY[item.category]);
  }

  const perFile = files.map((file) => {
    const families = familiesByFile.get(file)?.size ?? 0;
    return families <= 1 ? 1 : 1 / families;
  });
  return clamp01(perFile.reduce((a, b) => a + b, 0) / perFile.length);
}

export function scoreEvidence(
  evidence: Evidence[],
  allEvidence: Evidence[],
  narrativeSucceeded: boolean
): ConfidenceBreakdown {
  const quality = evidenceQuality(evidence);
  const quantity = evidenceQuantity(new Set(evidence.map((e) => e.filePath)).size);
  const consistency = evidenceConsistency(evidence, allEvidence);
  const synthesisBonus = narrativeSucceeded ? 1 : 0;

  const confidence = clamp01(
    WEIGHTS.quality * quality +
      WEIGHTS.quantity * quantity +
      WEIGHTS.consistency * consistency +
      WEIGHTS.synthesisBonus * synthesisBonus
  );

  return { quality, quantity, consistency, synthesisBonus, confidence: round3(confidence) };
}

export function scoreDecisions(drafts: DecisionDraft[], allEvidence: Evidence[]): ScoredDecision[] {
  return drafts.map((draft) => {
    const { confidence } = scoreEvidence(draft.evidence, allEvidence, draft.synthesis === 'narrative');
    return { ...draft, confidence, confidenceLevel: levelFor(confidence) };
  });
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
