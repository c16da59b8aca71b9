// archscry - reverse-engineered architecture knowledge
// Library entry point; the CLI lives in ./cli/index.ts

export * from './types.js';
export { loadConfig, defaultConfig, stringifyConfig, getConfigPath } from './core/config.js';
export { scanTree, classifyFile, validateInputPath } from './core/tree-scanner.js';
export { loadSignatures, compileSignatures, mergeSignatures } from './core/signatures.js';
export { ContentReader } from './core/content-reader.js';
export { detectTechnologies } from './core/detector.js';
export { extractDecisions } from './core/extractor.js';
export type { DecisionDraft } from './core/extractor.js';
export { scoreDecisions, scoreEvidence } from './core/scorer.js';
export type { ScoredDecision } from './core/scorer.js';
export { reconcile, rationaleSimilarity, mergeAccepted, carriedOver } from './core/reconciler.js';
export type { ReconciledDecision } from './core/reconciler.js';
export { loadStore, saveStore, JsonKnowledgeIndex } from './core/decision-store.js';
export type { DecisionStoreFile, KnowledgeIndex } from './core/decision-store.js';
export { runAnalyzers } from './core/analyzers/index.js';
export type { AnalyzerImplementations, AnalyzerResults } from './core/analyzers/index.js';
export { synthesizeDiagrams } from './core/analyzers/diagram-synthesizer.js';
export { modelThreats } from './core/analyzers/threat-modeler.js';
export { detectDebt } from './core/analyzers/debt-detector.js';
export { ArtifactRenderer } from './output/renderer.js';
export { validateArtifacts, computeScore, recommend } from './core/validator.js';
export { analyze, persistAccepted } from './core/pipeline.js';
export type { ApprovalPrompt, PipelineDeps, PipelineProgress, RunResult } from './core/pipeline.js';
export { NarrativeSynthesizer } from './core/narrative.js';
export type { PromptExecutor, PromptOptions, PromptResult } from './core/narrative.js';
export { getExecutor } from './providers/executors/index.js';
export { detectProvider, isProviderAvailable } from './providers/detect.js';
export { GitVersionControl } from './core/git.js';
export type { VersionControl, BranchOutcome } from './core/git.js';
export { GitHubTicketTracker } from './core/tickets.js';
export type { TicketTracker, TicketSubject } from './core/tickets.js';
export * from './core/errors.js';
