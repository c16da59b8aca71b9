/**
 * Narrative elaboration prompt
 *
 * The model never writes the rationale itself. It receives the
 * deterministic skeleton and adds a short elaboration after it, so both
 * synthesis modes share the same rationale text.
 */

import { Evidence } from '../../types.js';

export interface NarrativePromptInput {
  technologyName: string;
  category: string;
  skeleton: string;
  evidence: Evidence[];
}

const MAX_EVIDENCE_LINES = 15;

export function buildNarrativePrompt(input: NarrativePromptInput): string {
  const evidenceLines = input.evidence
    .slice(0, MAX_EVIDENCE_LINES)
    .map((e) => `- ${e.filePath}${e.lineRef ? `:${e.lineRef}` : ''} (${e.matchStrength} match)`)
    .join('\n');
  const remaining = input.evidence.length - MAX_EVIDENCE_LINES;

  return `You are documenting an architectural decision that was inferred from a codebase.

<decision>
Technology: ${input.technologyName}
Concern: ${input.category}
</decision>

<rationale>
${input.skeleton}
</rationale>

<evidence>
${evidenceLines}${remaining > 0 ? `\n- ... ${remaining} more file(s)` : ''}
</evidence>

<task>
Write 1 to 3 sentences that elaborate on the rationale above: what the evidence
suggests about how ${input.technologyName} is used for ${input.category}, and what
that implies for future changes. You may read the listed files.

Rules:
- Do NOT repeat or rephrase the rationale. It is kept verbatim.
- Do NOT mention files that are not in the evidence list.
- Plain prose only. No headings, no lists, no markdown emphasis.
- Keep it under 600 characters.
</task>

Respond with the elaboration inside <narrative></narrative> tags and nothing else.`;
}
