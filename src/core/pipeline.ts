/**
 * Import pipeline
 *
 * validate input -> branch -> scan -> detect -> extract -> score ->
 * reconcile -> analyzers (in parallel) -> render -> validate -> human
 * gate -> tickets -> persist
 *
 * Stages run in order; only the three analyzers overlap. The run aborts
 * on an InputError, a failed branch creation or an explicit abort.
 * Everything else is contained to its stage and shows up in the quality
 * report. Artifacts already written stay on disk whatever the outcome.
 */

import { isAbsolute, join, relative, resolve } from 'path';
import {
  AnalyzeOptions,
  ApprovalChoice,
  ArchscryConfig,
  DebtItem,
  ExitCode,
  FileInventory,
  QualityReport,
  Recommendation,
  ThreatFinding,
} from '../types.js';
import { loadConfig } from './config.js';
import { scanTree, validateInputPath } from './tree-scanner.js';
import { compileSignatures, loadSignatures } from './signatures.js';
import { ContentReader } from './content-reader.js';
import { detectTechnologies } from './detector.js';
import { extractDecisions } from './extractor.js';
import { scoreDecisions } from './scorer.js';
import { ReconciledDecision, carriedOver, mergeAccepted, reconcile, summarize } from './reconciler.js';
import {
  DecisionStoreFile,
  JsonKnowledgeIndex,
  highestDecisionNumber,
  loadStore,
  resolveStorePath,
} from './decision-store.js';
import { AnalyzerImplementations, AnalyzerResults, runAnalyzers } from './analyzers/index.js';
import { isCriticalThreat } from './analyzers/threat-modeler.js';
import { validateArtifacts } from './validator.js';
import { DEFAULT_NARRATIVE_TIMEOUT_MS, NarrativeSynthesizer, PromptExecutor } from './narrative.js';
import { BranchOutcome, GitVersionControl, VersionControl } from './git.js';
import { FiledTicket, GitHubTicketTracker, TicketSubject, TicketTracker } from './tickets.js';
import { InputError, StageError, describeError, toStageError } from './errors.js';
import { ArtifactRenderer, RenderedArtifact, Serialize } from '../output/renderer.js';
import { formatSummaryMarkdown } from '../output/summary.js';
import { getExecutor } from '../providers/executors/index.js';

export type StageName =
  | 'branch'
  | 'scan'
  | 'detect'
  | 'extract'
  | 'score'
  | 'reconcile'
  | 'analyze'
  | 'render'
  | 'validate'
  | 'tickets'
  | 'persist';

export interface PipelineProgress {
  onStageStart?: (stage: StageName, message: string) => void;
  onStageComplete?: (stage: StageName, message: string) => void;
  onWarning?: (message: string) => void;
  onProgress?: (message: string) => void;
}

/**
 * Human approval boundary. Asked for REVIEW and REJECT verdicts; a
 * REJECT only admits 'rerun' or 'abort'.
 */
export interface ApprovalPrompt {
  ask(result: RunResult): Promise<ApprovalChoice>;
}

export interface PipelineDeps {
  config?: ArchscryConfig;
  // null turns narrative synthesis off; undefined uses the configured provider
  executor?: PromptExecutor | null;
  versionControl?: VersionControl;
  ticketTracker?: TicketTracker;
  approval?: ApprovalPrompt;
  analyzers?: Partial<AnalyzerImplementations>;
  serialize?: Serialize;
  progress?: PipelineProgress;
  now?: () => Date;
}

export interface RunResult {
  exitCode: ExitCode;
  verdict: Recommendation | null;
  // Set once the human gate has been passed or the run ended at it
  approval?: ApprovalChoice;
  quality?: QualityReport;
  root: string;
  filesScanned: number;
  decisions: ReconciledDecision[];
  threats?: ThreatFinding[];
  debt?: DebtItem[];
  artifacts: RenderedArtifact[];
  outputDir?: string;
  storeBefore?: DecisionStoreFile;
  storeAfter?: DecisionStoreFile;
  persisted: boolean;
  tickets: FiledTicket[];
  attempts: number;
  error?: StageError;
  durationMs: number;
}

export interface AnalyzeRunOptions extends AnalyzeOptions {
  // Run everything but leave the decision store untouched
  dryRunStore?: boolean;
}

export async function analyze(
  path: string,
  options: AnalyzeRunOptions = {},
  deps: PipelineDeps = {}
): Promise<RunResult> {
  const startedAt = Date.now();
  const progress = deps.progress ?? {};
  const root = resolve(path);

  let context: RunContext;
  try {
    context = prepare(root, options, deps);
  } catch (error) {
    return failed(root, error, startedAt);
  }

  if (options.branchName) {
    progress.onStageStart?.('branch', `Creating branch ${options.branchName}...`);
    const vcs = deps.versionControl ?? new GitVersionControl(root);
    let outcome: BranchOutcome;
    try {
      outcome = await vcs.createBranch(options.branchName);
    } catch (error) {
      progress.onWarning?.(`Branch creation failed: ${describeError(error)}`);
      outcome = 'error';
    }
    if (outcome === 'error') {
      return {
        ...emptyResult(root, startedAt),
        exitCode: ExitCode.InternalError,
        error: { kind: 'internal', message: `Could not create branch ${options.branchName}` },
      };
    }
    progress.onStageComplete?.(
      'branch',
      outcome === 'already_exists' ? `Branch ${options.branchName} already exists` : `Created branch ${options.branchName}`
    );
  }

  let attempts = 0;
  for (;;) {
    attempts++;
    let result: RunResult;
    try {
      result = await runOnce(context, deps, startedAt);
    } catch (error) {
      return { ...failed(root, error, startedAt), attempts };
    }
    result.attempts = attempts;

    const choice = await gate(result, options, deps);
    result.approval = choice;

    if (choice === 'rerun') {
      progress.onProgress?.('Re-running analysis...');
      continue;
    }
    if (choice === 'abort') {
      return { ...result, exitCode: ExitCode.QualityGateRejected, durationMs: Date.now() - startedAt };
    }

    try {
      return await finalize(result, context, deps, startedAt);
    } catch (error) {
      return { ...failed(root, error, startedAt), attempts };
    }
  }
}

// ─────────────────────────────────────────────────────────────
// Stages
// ─────────────────────────────────────────────────────────────

interface RunContext {
  root: string;
  config: ArchscryConfig;
  options: AnalyzeRunOptions;
  outputDir: string;
  storePath: string;
}

function prepare(root: string, options: AnalyzeRunOptions, deps: PipelineDeps): RunContext {
  validateInputPath(root);
  const loaded = deps.config ?? loadConfig(root);

  const outputSetting = options.outputDir ?? loaded.output.dir;
  const outputDir = isAbsolute(outputSetting) ? outputSetting : join(root, outputSetting);

  // Our own output must never be scanned as evidence
  const outputRelative = relative(root, outputDir).split('\\').join('/');
  const insideTree = outputRelative !== '' && !outputRelative.startsWith('..') && !isAbsolute(outputRelative);
  const config: ArchscryConfig = insideTree
    ? { ...loaded, exclude: [...loaded.exclude, `${outputRelative}/**`] }
    : loaded;

  return {
    root,
    config,
    options,
    outputDir,
    storePath: resolveStorePath(root, config.store.path),
  };
}

async function runOnce(context: RunContext, deps: PipelineDeps, startedAt: number): Promise<RunResult> {
  const { root, config, options } = context;
  const progress = deps.progress ?? {};
  const now = deps.now ?? (() => new Date());

  // Scan
  progress.onStageStart?.('scan', 'Scanning source tree...');
  const inventory = await scanTree(root, config);
  progress.onStageComplete?.('scan', `Found ${inventory.files.length} files`);

  // Detect
  progress.onStageStart?.('detect', 'Matching technology signatures...');
  const signatures = loadSignatures(root, config.signatures);
  const reader = new ContentReader(config.limits.maxFileBytes);
  const detection = detectTechnologies(inventory, compileSignatures(signatures), reader, {
    onWarning: progress.onWarning,
  });
  const technologies = new Set(detection.evidence.map((e) => e.technologyId)).size;
  progress.onStageComplete?.('detect', `${detection.evidence.length} evidence record(s) for ${technologies} technologies`);

  // Extract
  const storeBefore = loadStore(context.storePath);
  progress.onStageStart?.('extract', 'Synthesizing decision records...');
  const drafts = await extractDecisions(
    detection.evidence,
    signatures,
    {
      minEvidence: config.extraction.minEvidence,
      startId: highestDecisionNumber(storeBefore) + 1,
      narrative: narrativeFor(context, deps),
    },
    { onWarning: progress.onWarning, onProgress: progress.onProgress }
  );
  progress.onStageComplete?.('extract', `${drafts.length} candidate decision(s)`);

  // Score
  progress.onStageStart?.('score', 'Scoring confidence...');
  const scored = scoreDecisions(drafts, detection.evidence);
  progress.onStageComplete?.('score', `${scored.filter((d) => d.confidenceLevel === 'low').length} low-confidence decision(s)`);

  // Reconcile
  progress.onStageStart?.('reconcile', 'Reconciling with the decision store...');
  const reconciled = reconcile(scored, storeBefore, {
    similarityThreshold: config.reconciliation.similarityThreshold,
    liveTechnologyIds: new Set(signatures.map((s) => s.id)),
    now: now(),
  });
  const stored = carriedOver(storeBefore, reconciled);
  const counts = summarize(reconciled);
  progress.onStageComplete?.(
    'reconcile',
    `${counts.newCount} new, ${counts.enrichmentCount} enrichment(s), ${counts.duplicateCount} duplicate(s)`
  );

  // Analyze
  progress.onStageStart?.('analyze', 'Running analyzers...');
  const analyzers = await runAnalyzers(
    { inventory, reader, decisions: reconciled, signatures },
    { skipThreatModel: options.skipThreatModel, skipTechDebt: options.skipTechDebt },
    {
      onAnalyzerStatus: (name, status) => {
        if (status === 'failed') progress.onWarning?.(`Analyzer ${name} failed; writing a flagged empty artifact`);
      },
    },
    deps.analyzers
  );
  progress.onStageComplete?.('analyze', describeAnalyzers(analyzers));

  // Render
  progress.onStageStart?.('render', `Writing artifacts to ${context.outputDir}...`);
  const renderer = new ArtifactRenderer(context.outputDir, deps.serialize);
  renderer.prepare();
  const rendered = renderer.renderAll({
    decisions: reconciled,
    stored,
    diagrams: analyzers.diagrams.artifact,
    threats: analyzers.threats?.artifact,
    debt: analyzers.debt?.artifact,
  });
  progress.onStageComplete?.('render', `${rendered.length} artifact(s) written`);

  // Validate
  progress.onStageStart?.('validate', 'Validating generated artifacts...');
  const validation = validateArtifacts({
    renderer,
    inventory,
    decisions: reconciled,
    stored,
    analyzers,
    artifacts: rendered,
    thresholds: config.validation,
  });
  const { report } = validation;
  progress.onStageComplete?.('validate', `Quality score ${report.score.toFixed(2)}: ${report.recommendation}`);

  const result: RunResult = {
    exitCode: ExitCode.Success,
    verdict: report.recommendation,
    quality: report,
    root,
    filesScanned: inventory.files.length,
    decisions: validation.decisions,
    threats: analyzers.threats?.artifact.threats,
    debt: analyzers.debt?.artifact.items,
    artifacts: validation.artifacts,
    outputDir: context.outputDir,
    storeBefore,
    persisted: false,
    tickets: [],
    attempts: 1,
    durationMs: Date.now() - startedAt,
  };

  writeReports(renderer, result, inventory, now(), progress);
  return result;
}

/**
 * Human gate. ACCEPT needs nobody; REVIEW and REJECT go to the approver.
 */
async function gate(result: RunResult, options: AnalyzeRunOptions, deps: PipelineDeps): Promise<ApprovalChoice> {
  if (result.verdict === 'ACCEPT') {
    return 'accept';
  }
  if (result.verdict === 'REVIEW' && options.acceptReview) {
    return 'accept';
  }
  if (!deps.approval) {
    return 'abort';
  }

  const choice = await deps.approval.ask(result);
  // A rejected run cannot be accepted as is
  if (result.verdict === 'REJECT' && choice === 'accept') {
    return 'abort';
  }
  return choice;
}

async function finalize(
  result: RunResult,
  context: RunContext,
  deps: PipelineDeps,
  startedAt: number
): Promise<RunResult> {
  const progress = deps.progress ?? {};
  let tickets: FiledTicket[] = [];

  if (context.options.createTicketsForLowConfidence) {
    progress.onStageStart?.('tickets', 'Filing tickets...');
    tickets = await fileTickets(result, deps.ticketTracker ?? new GitHubTicketTracker(context.root), progress);
    progress.onStageComplete?.('tickets', `${tickets.filter((t) => t.ticketId).length} ticket(s) filed`);
  }

  if (context.options.dryRunStore) {
    return { ...result, tickets, durationMs: Date.now() - startedAt };
  }

  progress.onStageStart?.('persist', 'Persisting accepted decisions...');
  const storeAfter = persistAccepted(result, context.storePath);
  progress.onStageComplete?.('persist', `Decision store now holds ${storeAfter.decisions.length} decision(s)`);

  return {
    ...result,
    tickets,
    storeAfter,
    persisted: true,
    durationMs: Date.now() - startedAt,
  };
}

/**
 * Merge this run's accepted records into the store as it is on disk now,
 * then write it back atomically. Another run may have persisted since
 * this one started; its records and evidence are kept.
 */
export function persistAccepted(result: Pick<RunResult, 'decisions'>, storePath: string): DecisionStoreFile {
  const latest = loadStore(storePath);
  const index = new JsonKnowledgeIndex(storePath, latest);

  for (const record of mergeAccepted(latest, result.decisions)) {
    index.persistDecision(record);
  }

  return index.commit();
}

async function fileTickets(
  result: RunResult,
  tracker: TicketTracker,
  progress: PipelineProgress
): Promise<FiledTicket[]> {
  const subjects: TicketSubject[] = [
    ...result.decisions
      .filter((d) => (d.record.status === 'NEW' || d.record.status === 'ENRICHMENT') && d.record.confidenceLevel === 'low')
      .map((d): TicketSubject => ({ type: 'decision', record: d.record })),
    ...(result.threats ?? []).filter(isCriticalThreat).map((finding): TicketSubject => ({ type: 'threat', finding })),
  ];

  const filed: FiledTicket[] = [];
  for (const subject of subjects) {
    const subjectId = subject.type === 'decision' ? subject.record.id : subject.finding.id;
    try {
      filed.push({ subjectId, ticketId: await tracker.fileTicket(subject) });
    } catch (error) {
      const message = describeError(error);
      progress.onWarning?.(`Could not file a ticket for ${subjectId}: ${message}`);
      filed.push({ subjectId, error: message });
    }
  }
  return filed;
}

// ─────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────

function narrativeFor(context: RunContext, deps: PipelineDeps): NarrativeSynthesizer | undefined {
  if (context.options.disableNarrativeSynthesis || deps.executor === null) {
    return undefined;
  }
  const executor = deps.executor ?? getExecutor(context.config.provider);
  return new NarrativeSynthesizer(executor, { cwd: context.root, timeoutMs: DEFAULT_NARRATIVE_TIMEOUT_MS });
}

function writeReports(
  renderer: ArtifactRenderer,
  result: RunResult,
  inventory: FileInventory,
  now: Date,
  progress: PipelineProgress
): void {
  if (!result.quality) return;

  const written = [
    renderer.renderQualityReport(result.quality),
    renderer.renderSummary(
      formatSummaryMarkdown({
        root: result.root,
        timestamp: now.toISOString(),
        filesScanned: inventory.files.length,
        decisions: result.decisions,
        threats: result.threats,
        debt: result.debt,
        quality: result.quality,
      })
    ),
  ];

  for (const artifact of written) {
    if (!artifact.ok) {
      progress.onWarning?.(artifact.error?.message ?? `Could not write ${artifact.path}`);
    }
  }
  result.artifacts = [...result.artifacts, ...written];
}

function describeAnalyzers(results: AnalyzerResults): string {
  const parts = [`${results.diagrams.name} ${results.diagrams.status}`];
  if (results.threats) parts.push(`${results.threats.name} ${results.threats.status}`);
  if (results.debt) parts.push(`${results.debt.name} ${results.debt.status}`);
  return parts.join(', ');
}

function emptyResult(root: string, startedAt: number): RunResult {
  return {
    exitCode: ExitCode.Success,
    verdict: null,
    root,
    filesScanned: 0,
    decisions: [],
    artifacts: [],
    persisted: false,
    tickets: [],
    attempts: 0,
    durationMs: Date.now() - startedAt,
  };
}

function failed(root: string, error: unknown, startedAt: number): RunResult {
  const input = error instanceof InputError;
  return {
    ...emptyResult(root, startedAt),
    exitCode: input ? ExitCode.InputInvalid : ExitCode.InternalError,
    error: toStageError(error, 'internal'),
  };
}
