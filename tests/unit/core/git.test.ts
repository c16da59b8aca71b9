import { describe, it, expect, vi, beforeEach } from 'vitest';

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));

vi.mock('execa', () => ({ execa: execaMock }));

import { GitVersionControl } from '../../../src/core/git.js';

describe('core/git', () => {
  const git = new GitVersionControl('/repo');

  beforeEach(() => {
    execaMock.mockReset();
  });

  it('should create a new branch', async () => {
    execaMock
      .mockResolvedValueOnce({ exitCode: 0 })
      .mockResolvedValueOnce({ exitCode: 1 })
      .mockResolvedValueOnce({ exitCode: 0 });

    await expect(git.createBranch('import/adr')).resolves.toBe('ok');
    expect(execaMock.mock.calls.map((call) => call[1])).toEqual([
      ['check-ref-format', '--branch', 'import/adr'],
      ['rev-parse', '--verify', '--quiet', 'refs/heads/import/adr'],
      ['checkout', '-b', 'import/adr'],
    ]);
  });

  it('should report an existing branch without checking it out', async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 0 }).mockResolvedValueOnce({ exitCode: 0 });

    await expect(git.createBranch('main')).resolves.toBe('already_exists');
    expect(execaMock).toHaveBeenCalledTimes(2);
  });

  it('should refuse an invalid branch name', async () => {
    execaMock.mockResolvedValueOnce({ exitCode: 128 });

    await expect(git.createBranch('bad..name')).resolves.toBe('error');
    expect(execaMock).toHaveBeenCalledTimes(1);
  });

  it('should report a failed checkout', async () => {
    execaMock
      .mockResolvedValueOnce({ exitCode: 0 })
      .mockResolvedValueOnce({ exitCode: 1 })
      .mockResolvedValueOnce({ exitCode: 128 });

    await expect(git.createBranch('import/adr')).resolves.toBe('error');
  });
});
