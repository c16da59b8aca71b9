import * as p from '@clack/prompts';
import chalk from 'chalk';
import { basename, relative } from 'path';
import { ApprovalChoice, ExitCode } from '../../types.js';
import { ApprovalPrompt, PipelineProgress, RunResult, analyze } from '../../core/pipeline.js';
import { SUMMARY_PATH } from '../../output/renderer.js';
import { isCriticalThreat } from '../../core/analyzers/threat-modeler.js';
import { CardData, renderRunCard } from '../components/card.js';

export interface AnalyzeCommandOptions {
  skipThreatModel?: boolean;
  skipTechDebt?: boolean;
  // commander sets this false for --no-narrative
  narrative: boolean;
  tickets?: boolean;
  branch?: string;
  output?: string;
  yes?: boolean;
  json?: boolean;
  dryRun?: boolean;
}

/**
 * Interactive approval gate. A rejected run can only be re-run or
 * abandoned.
 */
export class ClackApprovalPrompt implements ApprovalPrompt {
  async ask(result: RunResult): Promise<ApprovalChoice> {
    const verdict = result.verdict ?? 'REJECT';
    const score = result.quality?.score.toFixed(2) ?? '0.00';

    console.log();
    const color = verdict === 'REVIEW' ? chalk.yellow : chalk.red;
    p.log.warn(`Quality gate: ${color(verdict)} (score ${score})`);
    for (const issue of result.quality?.issues ?? []) {
      if (issue.severity === 'INFO') continue;
      const tag = issue.severity === 'CRITICAL' ? chalk.red(issue.severity) : chalk.yellow(issue.severity);
      console.log(`  ${tag} ${issue.message}`);
    }
    if (result.outputDir) {
      p.log.info(`Artifacts are in ${chalk.cyan(result.outputDir)}; see ${SUMMARY_PATH}`);
    }

    const options: Array<{ value: ApprovalChoice; label: string; hint?: string }> = [];
    if (verdict === 'REVIEW') {
      options.push({ value: 'accept', label: 'Accept', hint: 'persist the accepted decisions' });
    }
    options.push(
      { value: 'rerun', label: 'Re-run', hint: 'run the import again from the scan' },
      { value: 'abort', label: 'Abort', hint: 'keep the artifacts, leave the decision store as is' }
    );

    const choice = await p.select({
      message: verdict === 'REVIEW' ? 'Review the artifacts. Accept this run?' : 'This run was rejected.',
      options,
    });

    if (p.isCancel(choice) || !isApprovalChoice(choice)) {
      return 'abort';
    }
    return choice;
  }
}

const APPROVAL_CHOICES: readonly ApprovalChoice[] = ['accept', 'rerun', 'abort'];

function isApprovalChoice(value: unknown): value is ApprovalChoice {
  return APPROVAL_CHOICES.some((choice) => choice === value);
}

export async function analyzeCommand(path: string | undefined, options: AnalyzeCommandOptions): Promise<void> {
  const target = path ?? process.cwd();
  const interactive = !options.json && process.stdout.isTTY === true;

  if (!options.json) {
    p.intro(chalk.cyan('archscry') + chalk.dim(' - architecture import'));
  }

  const spinner = options.json ? null : p.spinner();
  const warnings: string[] = [];

  const progress: PipelineProgress = {
    onStageStart: (_stage, message) => spinner?.start(message),
    onStageComplete: (_stage, message) => spinner?.stop(message),
    onProgress: (message) => spinner?.message(message),
    onWarning: (message) => warnings.push(message),
  };

  const result = await analyze(
    target,
    {
      skipThreatModel: options.skipThreatModel,
      skipTechDebt: options.skipTechDebt,
      disableNarrativeSynthesis: !options.narrative,
      createTicketsForLowConfidence: options.tickets,
      branchName: options.branch,
      outputDir: options.output,
      acceptReview: options.yes,
      dryRunStore: options.dryRun,
    },
    {
      progress,
      approval: interactive ? new ClackApprovalPrompt() : undefined,
    }
  );

  if (options.json) {
    console.log(JSON.stringify(toJson(result), null, 2));
    process.exit(result.exitCode);
  }

  if (warnings.length > 0) {
    p.log.warn(`${warnings.length} warning(s):`);
    for (const warning of warnings.slice(0, 10)) {
      console.log(chalk.yellow(`  - ${warning}`));
    }
    if (warnings.length > 10) {
      console.log(chalk.yellow(`  ... and ${warnings.length - 10} more`));
    }
  }

  if (result.error) {
    p.log.error(result.error.message);
    p.outro(chalk.red(result.exitCode === ExitCode.InputInvalid ? 'Invalid input.' : 'Import failed.'));
    process.exit(result.exitCode);
  }

  if (result.quality && result.verdict) {
    console.log();
    console.log(renderRunCard(toCard(result)));
    console.log();
  }

  const filed = result.tickets.filter((t) => t.ticketId);
  if (filed.length > 0) {
    p.log.info(`Filed ${filed.length} ticket(s):`);
    for (const ticket of filed) {
      console.log(`  ${ticket.subjectId}  ${chalk.cyan(ticket.ticketId ?? '')}`);
    }
  }

  if (result.exitCode === ExitCode.QualityGateRejected) {
    p.outro(chalk.red('Run not accepted. The decision store was left unchanged.'));
  } else {
    p.outro(chalk.green('Done.'));
  }
  process.exit(result.exitCode);
}

function toCard(result: RunResult): CardData {
  const count = (status: string) => result.decisions.filter((d) => d.record.status === status).length;

  return {
    meta: {
      repoName: basename(result.root),
      duration: result.durationMs,
      filesScanned: result.filesScanned,
      attempts: result.attempts,
    },
    verdict: result.verdict ?? 'REJECT',
    score: result.quality?.score ?? 0,
    decisions: {
      new: count('NEW'),
      enrichment: count('ENRICHMENT'),
      duplicate: count('DUPLICATE'),
      removed: count('REMOVED'),
    },
    threats: result.threats && {
      total: result.threats.length,
      critical: result.threats.filter(isCriticalThreat).length,
    },
    debt: result.debt && {
      total: result.debt.length,
      hours: result.debt.reduce((sum, item) => sum + item.effortEstimateHours, 0),
    },
    outputDir: result.outputDir ? relative(process.cwd(), result.outputDir) || '.' : '-',
    persisted: result.persisted,
  };
}

function toJson(result: RunResult): object {
  return {
    exitCode: result.exitCode,
    verdict: result.verdict,
    approval: result.approval,
    score: result.quality?.score,
    filesScanned: result.filesScanned,
    attempts: result.attempts,
    persisted: result.persisted,
    outputDir: result.outputDir,
    decisions: result.decisions.map((d) => d.record),
    threats: result.threats,
    debt: result.debt,
    issues: result.quality?.issues,
    corrections: result.quality?.correctionsApplied,
    artifacts: result.artifacts.map((a) => ({ path: a.path, ok: a.ok, error: a.error?.message })),
    tickets: result.tickets,
    error: result.error,
  };
}
