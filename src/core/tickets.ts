/**
 * Ticket-tracker collaborator
 *
 * Files an issue for a decision or threat that needs a human. The
 * GitHub implementation shells out to `gh issue create`.
 */

import { execa } from 'execa';
import { DecisionRecord, ThreatFinding } from '../types.js';
import { GitHubIssueUrl } from './validation.js';

export type TicketSubject =
  | { type: 'decision'; record: DecisionRecord }
  | { type: 'threat'; finding: ThreatFinding };

export interface TicketTracker {
  fileTicket(subject: TicketSubject): Promise<string>;
}

export interface FiledTicket {
  subjectId: string;
  ticketId?: string;
  error?: string;
}

export function ticketTitle(subject: TicketSubject): string {
  return subject.type === 'decision'
    ? `[archscry] Review ${subject.record.id}: ${subject.record.title}`
    : `[archscry] Threat ${subject.finding.id}: ${subject.finding.title}`;
}

export function ticketBody(subject: TicketSubject): string {
  if (subject.type === 'decision') {
    const { record } = subject;
    return [
      `Inferred decision **${record.id}** has ${record.confidenceLevel} confidence (${record.confidence.toFixed(2)}) and needs manual review.`,
      '',
      record.rationale,
      '',
      '**Evidence**',
      ...record.evidenceRefs.map((ref) => `- \`${ref}\``),
    ].join('\n');
  }

  const { finding } = subject;
  return [
    `**${finding.strideCategory}**, severity ${finding.severity.toFixed(1)}${finding.escalate ? ' (escalated)' : ''}`,
    '',
    finding.description,
    '',
    `**Mitigation:** ${finding.mitigation}`,
    '',
    '**Evidence**',
    ...finding.evidenceRefs.map((ref) => `- \`${ref}\``),
  ].join('\n');
}

export class GitHubTicketTracker implements TicketTracker {
  constructor(private readonly cwd: string) {}

  async fileTicket(subject: TicketSubject): Promise<string> {
    const { stdout, stderr, exitCode } = await execa(
      'gh',
      ['issue', 'create', '--title', ticketTitle(subject), '--body', ticketBody(subject)],
      { cwd: this.cwd, reject: false, stdin: 'ignore' }
    );

    if (exitCode !== 0) {
      throw new Error(`gh issue create failed: ${(stderr || stdout).substring(0, 200)}`);
    }

    const url = GitHubIssueUrl.safeParse(stdout.trim().split('\n').pop() ?? '');
    if (!url.success) {
      throw new Error(`gh issue create returned no issue URL: ${stdout.substring(0, 200)}`);
    }
    return url.data;
  }
}
