import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));

vi.mock('execa', () => ({ execa: execaMock }));

import { ClaudeCodeExecutor } from '../../../src/providers/executors/claude-code.js';

describe('ClaudeCodeExecutor', () => {
  let executor: ClaudeCodeExecutor;

  beforeEach(() => {
    execaMock.mockReset();
    executor = new ClaudeCodeExecutor();
  });

  afterEach(() => {
    delete process.env.ARCHSCRY_CLAUDE_CODE_COMMAND;
  });

  it('should have the correct name', () => {
    expect(executor.name).toBe('claude-code');
  });

  it('should run the prompt read-only in the given directory', async () => {
    execaMock.mockResolvedValue({ stdout: '<narrative>ok</narrative>', stderr: '', exitCode: 0 });

    const result = await executor.runPrompt('describe it', { cwd: '/repo', timeout: 1000 });

    expect(result).toEqual({ output: '<narrative>ok</narrative>', error: undefined });
    expect(execaMock).toHaveBeenCalledWith(
      'claude',
      ['-p', 'describe it', '--output-format', 'text', '--allowedTools', 'Read,Grep,Glob'],
      expect.objectContaining({ cwd: '/repo', timeout: 1000, reject: false, stdin: 'ignore' })
    );
  });

  it('should use the command override from the environment', async () => {
    process.env.ARCHSCRY_CLAUDE_CODE_COMMAND = '/opt/bin/claude';
    execaMock.mockResolvedValue({ stdout: 'x', stderr: '', exitCode: 0 });

    await executor.runPrompt('p', { cwd: '/repo' });

    expect(execaMock.mock.calls[0][0]).toBe('/opt/bin/claude');
  });

  it('should report rate limiting', async () => {
    execaMock.mockResolvedValue({ stdout: '', stderr: 'HTTP 429: too many requests', exitCode: 1 });

    await expect(executor.runPrompt('p', { cwd: '/repo' })).rejects.toThrow(
      'Claude API rate limit reached. Try again later.'
    );
  });

  it('should report authentication failures', async () => {
    execaMock.mockResolvedValue({ stdout: '', stderr: '401 unauthorized', exitCode: 1 });

    await expect(executor.runPrompt('p', { cwd: '/repo' })).rejects.toThrow(
      'Claude API authentication failed. Check your API key.'
    );
  });

  it('should explain a missing CLI', async () => {
    execaMock.mockRejectedValue(new Error('spawn claude ENOENT'));

    await expect(executor.runPrompt('p', { cwd: '/repo' })).rejects.toThrow(
      'Claude Code not found. Install: npm install -g @anthropic-ai/claude-code'
    );
  });

  it('should be available when the CLI resolves on PATH', async () => {
    execaMock.mockResolvedValue({ stdout: '/usr/local/bin/claude', stderr: '', exitCode: 0 });

    await expect(executor.isAvailable()).resolves.toBe(true);
  });
});
