/**
 * Claude Code Executor
 *
 * Runs one prompt through the Claude CLI in print mode. The model may read
 * the evidence files but gets no tool that writes.
 */

import { CliExecutor } from './cli-executor.js';

export class ClaudeCodeExecutor extends CliExecutor {
  readonly name = 'claude-code';
  protected readonly defaultTimeoutMs = 300_000;
  protected readonly installHint = 'Claude Code not found. Install: npm install -g @anthropic-ai/claude-code';

  protected args(prompt: string): string[] {
    return ['-p', prompt, '--output-format', 'text', '--allowedTools', 'Read,Grep,Glob'];
  }

  protected describeFailure(stderr: string, stdout: string): string | null {
    if (stderr.includes('429') || stderr.includes('rate limit') || stderr.includes('too many requests')) {
      return 'Claude API rate limit reached. Try again later.';
    }
    if (stderr.includes('401') || stderr.includes('unauthorized') || stderr.includes('invalid api key')) {
      return 'Claude API authentication failed. Check your API key.';
    }
    if (stderr.includes('Error:') && !stdout) {
      return `Claude Code error: ${stderr.substring(0, 200)}`;
    }
    return null;
  }
}
