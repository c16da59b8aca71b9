import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Inventory Types
// ─────────────────────────────────────────────────────────────

// Non-production kinds (test, fixture, vendored-config) count as
// polluted evidence in the post-generation validator.
export const FileKind = z.enum([
  'source',
  'config',
  'test',
  'fixture',
  'infrastructure',
  'documentation',
  'vendored-config',
]);
export type FileKind = z.infer<typeof FileKind>;

export interface InventoryFile {
  path: string;         // Relative to the scanned root, forward slashes
  absolutePath: string;
  size: number;
  kind: FileKind;
}

export interface FileInventory {
  root: string;
  files: InventoryFile[];
  totalBytes: number;
}

// ─────────────────────────────────────────────────────────────
// Technology Signatures & Evidence
// ─────────────────────────────────────────────────────────────

export const DecisionCategory = z.enum([
  'language',
  'framework',
  'database',
  'orm',
  'auth',
  'api-style',
  'caching',
  'messaging',
  'testing',
  'build-tool',
  'infrastructure',
  'ci',
]);
export type DecisionCategory = z.infer<typeof DecisionCategory>;

export const Disambiguator = z.union([
  z.object({ markerFile: z.string().min(1) }),
  z.object({ contentToken: z.string().min(1) }),
]);
export type Disambiguator = z.infer<typeof Disambiguator>;

export const TechnologySignature = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/),
  name: z.string(),
  category: DecisionCategory,
  filePatterns: z.array(z.string()).min(1),
  contentPatterns: z.array(z.string()).default([]),
  disambiguators: z.array(Disambiguator).default([]),
  // Accept a bare path match when no content pattern hits
  pathOnly: z.boolean().default(false),
  // npm package name and current major, used by the dependency-age debt rules
  npmPackage: z.string().optional(),
  currentMajor: z.number().int().nonnegative().optional(),
});
export type TechnologySignature = z.infer<typeof TechnologySignature>;

export const SignatureRegistry = z.object({
  version: z.string().default('1'),
  signatures: z.array(TechnologySignature),
});
export type SignatureRegistry = z.infer<typeof SignatureRegistry>;

export const MatchStrength = z.enum(['path', 'content']);
export type MatchStrength = z.infer<typeof MatchStrength>;

export const Evidence = z.object({
  technologyId: z.string(),
  category: DecisionCategory,
  filePath: z.string(),
  lineRef: z.number().int().positive().optional(),
  matchStrength: MatchStrength,
});
export type Evidence = z.infer<typeof Evidence>;

// ─────────────────────────────────────────────────────────────
// Decision Records
// ─────────────────────────────────────────────────────────────

export const DecisionStatus = z.enum(['NEW', 'DUPLICATE', 'ENRICHMENT', 'ACCEPTED', 'REMOVED']);
export type DecisionStatus = z.infer<typeof DecisionStatus>;

export const SynthesisMode = z.enum(['template', 'narrative']);
export type SynthesisMode = z.infer<typeof SynthesisMode>;

export const ConfidenceLevel = z.enum(['high', 'medium', 'low']);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevel>;

export const DecisionRecord = z.object({
  id: z.string().regex(/^ADR-\d{3,}$/),
  title: z.string(),
  category: DecisionCategory,
  technologyId: z.string(),
  technologyName: z.string(),
  // Always the deterministic skeleton, whatever the synthesis mode
  rationale: z.string(),
  // Narrative elaboration of the skeleton, present only in narrative mode
  narrative: z.string().optional(),
  synthesis: SynthesisMode,
  confidence: z.number().min(0).max(1),
  confidenceLevel: ConfidenceLevel,
  evidenceRefs: z.array(z.string()),
  status: DecisionStatus,
  createdAt: z.string().datetime(),
  // Id of the persisted record this one supersedes (ENRICHMENT only)
  supersedes: z.string().optional(),
});
export type DecisionRecord = z.infer<typeof DecisionRecord>;

// ─────────────────────────────────────────────────────────────
// Threats & Debt
// ─────────────────────────────────────────────────────────────

export const StrideCategory = z.enum([
  'spoofing',
  'tampering',
  'repudiation',
  'information-disclosure',
  'denial-of-service',
  'elevation-of-privilege',
]);
export type StrideCategory = z.infer<typeof StrideCategory>;

export const ThreatFinding = z.object({
  id: z.string(),
  title: z.string(),
  strideCategory: StrideCategory,
  severity: z.number().min(0).max(10),
  description: z.string(),
  mitigation: z.string(),
  evidenceRefs: z.array(z.string()),
  escalate: z.boolean(),
});
export type ThreatFinding = z.infer<typeof ThreatFinding>;

export const DebtPriority = z.enum(['P0', 'P1', 'P2', 'P3']);
export type DebtPriority = z.infer<typeof DebtPriority>;

export const DebtCategory = z.enum([
  'workaround',
  'complexity',
  'suppressed-check',
  'debug-leftover',
  'deprecated-usage',
  'outdated-dependency',
  'unpinned-dependency',
]);
export type DebtCategory = z.infer<typeof DebtCategory>;

export const DebtItem = z.object({
  id: z.string(),
  title: z.string(),
  priority: DebtPriority,
  category: DebtCategory,
  location: z.string(),
  effortEstimateHours: z.number().nonnegative(),
});
export type DebtItem = z.infer<typeof DebtItem>;

export interface DiagramNode {
  id: string;
  label: string;
  group: string;
  shape: 'box' | 'database' | 'queue' | 'round';
}

export interface DiagramEdge {
  from: string;
  to: string;
  label?: string;
}

export interface Diagram {
  id: string;
  title: string;
  kind: 'system-context' | 'technology-stack';
  nodes: DiagramNode[];
  edges: DiagramEdge[];
  mermaid: string;
  technologies: string[];
}

// ─────────────────────────────────────────────────────────────
// Quality Report
// ─────────────────────────────────────────────────────────────

export const IssueSeverity = z.enum(['CRITICAL', 'WARNING', 'INFO']);
export type IssueSeverity = z.infer<typeof IssueSeverity>;

export const QualityIssue = z.object({
  checker: z.string(),
  severity: IssueSeverity,
  message: z.string(),
  target: z.string().optional(),
  penalty: z.number().nonnegative(),
});
export type QualityIssue = z.infer<typeof QualityIssue>;

export const Recommendation = z.enum(['ACCEPT', 'REVIEW', 'REJECT']);
export type Recommendation = z.infer<typeof Recommendation>;

export const QualityReport = z.object({
  score: z.number().min(0).max(1),
  issues: z.array(QualityIssue),
  correctionsApplied: z.array(z.string()),
  recommendation: Recommendation,
});
export type QualityReport = z.infer<typeof QualityReport>;

// ─────────────────────────────────────────────────────────────
// Config Types
// ─────────────────────────────────────────────────────────────

export const ProviderType = z.enum(['claude-code', 'ollama']);
export type ProviderType = z.infer<typeof ProviderType>;

export const ArchscryConfig = z.object({
  version: z.string().default('1'),
  provider: ProviderType.default('claude-code'),

  // Scan settings
  include: z.array(z.string()).default(['**/*']),
  exclude: z.array(z.string()).default([]),
  limits: z.object({
    maxFiles: z.number().int().positive().default(20_000),
    maxTotalBytes: z.number().int().positive().default(200 * 1024 * 1024),
    maxFileBytes: z.number().int().positive().default(256 * 1024),
  }).default({}),

  // Optional registry merged over the built-in signatures
  signatures: z.string().optional(),

  extraction: z.object({
    minEvidence: z.number().int().positive().default(1),
  }).default({}),

  reconciliation: z.object({
    similarityThreshold: z.number().min(0).max(1).default(0.8),
  }).default({}),

  validation: z.object({
    pollutionRatio: z.number().min(0).max(1).default(0.7),
    acceptThreshold: z.number().min(0).max(1).default(0.85),
    reviewThreshold: z.number().min(0).max(1).default(0.7),
  }).default({}),

  output: z.object({
    dir: z.string().default('.archscry/output'),
  }).default({}),

  store: z.object({
    path: z.string().default('.archscry/decisions.json'),
  }).default({}),
});
export type ArchscryConfig = z.infer<typeof ArchscryConfig>;

// ─────────────────────────────────────────────────────────────
// Run Types
// ─────────────────────────────────────────────────────────────

export interface AnalyzeOptions {
  skipThreatModel?: boolean;
  skipTechDebt?: boolean;
  disableNarrativeSynthesis?: boolean;
  createTicketsForLowConfidence?: boolean;
  branchName?: string;
  outputDir?: string;
  // Accept a REVIEW verdict without asking
  acceptReview?: boolean;
}

export const ExitCode = {
  Success: 0,
  InputInvalid: 1,
  InternalError: 2,
  QualityGateRejected: 3,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type ApprovalChoice = 'accept' | 'rerun' | 'abort';
