/**
 * Version-control collaborator
 *
 * Creates the branch an import run is recorded on. Called once, before
 * scanning, so a failure costs nothing.
 */

import { execa } from 'execa';

export type BranchOutcome = 'ok' | 'already_exists' | 'error';

export interface VersionControl {
  createBranch(name: string): Promise<BranchOutcome>;
}

export class GitVersionControl implements VersionControl {
  constructor(private readonly cwd: string) {}

  async createBranch(name: string): Promise<BranchOutcome> {
    const valid = await execa('git', ['check-ref-format', '--branch', name], {
      cwd: this.cwd,
      reject: false,
    });
    if (valid.exitCode !== 0) {
      return 'error';
    }

    const existing = await execa('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${name}`], {
      cwd: this.cwd,
      reject: false,
    });
    if (existing.exitCode === 0) {
      return 'already_exists';
    }

    const created = await execa('git', ['checkout', '-b', name], {
      cwd: this.cwd,
      reject: false,
    });
    return created.exitCode === 0 ? 'ok' : 'error';
  }
}
