/**
 * Analyzer stage
 *
 * Diagram synthesis, threat modeling and debt detection run side by
 * side over the same read-only input. Each runs to completion or fails
 * on its own; a failed analyzer still hands back an empty artifact
 * flagged as failed, so its file is written and the run goes on.
 */

import { FileInventory, TechnologySignature } from '../../types.js';
import { ContentReader } from '../content-reader.js';
import { AnalyzerFailure } from '../errors.js';
import { ReconciledDecision } from '../reconciler.js';
import { DiagramArtifact, synthesizeDiagrams } from './diagram-synthesizer.js';
import { ThreatModelArtifact, modelThreats } from './threat-modeler.js';
import { DebtArtifact, detectDebt } from './debt-detector.js';

export type AnalyzerName = 'diagrams' | 'threat-model' | 'tech-debt';

export type AnalyzerStatus = 'running' | 'succeeded' | 'failed';

export interface AnalyzerInput {
  inventory: FileInventory;
  reader: ContentReader;
  decisions: ReconciledDecision[];
  signatures: TechnologySignature[];
}

/**
 * Marker carried by every artifact; set when the analyzer failed
 */
export interface FailureFlag {
  failed?: boolean;
  error?: string;
}

export interface AnalyzerOutcome<T extends FailureFlag> {
  name: AnalyzerName;
  status: Exclude<AnalyzerStatus, 'running'>;
  artifact: T;
  error?: AnalyzerFailure;
}

export interface AnalyzerResults {
  diagrams: AnalyzerOutcome<DiagramArtifact>;
  threats?: AnalyzerOutcome<ThreatModelArtifact>;
  debt?: AnalyzerOutcome<DebtArtifact>;
}

export interface AnalyzerSelection {
  skipThreatModel?: boolean;
  skipTechDebt?: boolean;
}

export interface AnalyzerProgress {
  onAnalyzerStatus?: (name: AnalyzerName, status: AnalyzerStatus) => void;
}

/**
 * Run one analyzer. Never throws.
 */
export async function runAnalyzer<T extends FailureFlag>(
  name: AnalyzerName,
  fn: () => T | Promise<T>,
  empty: T,
  progress: AnalyzerProgress = {}
): Promise<AnalyzerOutcome<T>> {
  progress.onAnalyzerStatus?.(name, 'running');
  try {
    const artifact = await fn();
    progress.onAnalyzerStatus?.(name, 'succeeded');
    return { name, status: 'succeeded', artifact };
  } catch (cause) {
    const error = new AnalyzerFailure(name, cause);
    progress.onAnalyzerStatus?.(name, 'failed');
    return {
      name,
      status: 'failed',
      artifact: { ...empty, failed: true, error: error.message },
      error,
    };
  }
}

export async function runAnalyzers(
  input: AnalyzerInput,
  selection: AnalyzerSelection = {},
  progress: AnalyzerProgress = {},
  analyzers: Partial<AnalyzerImplementations> = {}
): Promise<AnalyzerResults> {
  const impl: AnalyzerImplementations = { ...DEFAULT_ANALYZERS, ...analyzers };

  const [diagrams, threats, debt] = await Promise.all([
    runAnalyzer('diagrams', () => impl.diagrams(input), { diagrams: [] }, progress),
    selection.skipThreatModel
      ? undefined
      : runAnalyzer('threat-model', () => impl.threats(input), { threats: [] }, progress),
    selection.skipTechDebt
      ? undefined
      : runAnalyzer('tech-debt', () => impl.debt(input), { items: [] }, progress),
  ]);

  return {
    diagrams,
    ...(threats ? { threats } : {}),
    ...(debt ? { debt } : {}),
  };
}

export interface AnalyzerImplementations {
  diagrams: (input: AnalyzerInput) => DiagramArtifact | Promise<DiagramArtifact>;
  threats: (input: AnalyzerInput) => ThreatModelArtifact | Promise<ThreatModelArtifact>;
  debt: (input: AnalyzerInput) => DebtArtifact | Promise<DebtArtifact>;
}

const DEFAULT_ANALYZERS: AnalyzerImplementations = {
  diagrams: (input) => synthesizeDiagrams(input.decisions),
  threats: (input) => modelThreats(input),
  debt: (input) => detectDebt(input),
};

export type { DiagramArtifact } from './diagram-synthesizer.js';
export type { ThreatModelArtifact } from './threat-modeler.js';
export type { DebtArtifact } from './debt-detector.js';
