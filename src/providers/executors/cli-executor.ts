/**
 * Base for executors that shell out to a provider CLI.
 *
 * Subclasses supply the argument list and translate the CLI's stderr into
 * a readable error; spawning, timeouts and the missing-binary case are
 * handled here.
 */

import { execa } from 'execa';
import { PromptExecutor, PromptOptions, PromptResult } from '../../core/narrative.js';
import { ProviderType } from '../../types.js';
import { getProviderCommand, isProviderAvailable } from '../detect.js';

export abstract class CliExecutor implements PromptExecutor {
  abstract readonly name: ProviderType;
  protected abstract readonly defaultTimeoutMs: number;
  // Shown when the binary cannot be spawned
  protected abstract readonly installHint: string;

  protected abstract args(prompt: string): string[];

  /**
   * Error message for a failed invocation, or null when the output is usable
   */
  protected abstract describeFailure(stderr: string, stdout: string): string | null;

  async isAvailable(): Promise<boolean> {
    return isProviderAvailable(this.name);
  }

  async runPrompt(prompt: string, options: PromptOptions): Promise<PromptResult> {
    const command = getProviderCommand(this.name);
    debug(`${this.name}: ${command} (prompt ${prompt.length} chars, cwd ${options.cwd})`);

    let stdout: string;
    let stderr: string;
    try {
      ({ stdout, stderr } = await execa(command, this.args(prompt), {
        cwd: options.cwd,
        timeout: options.timeout || this.defaultTimeoutMs,
        env: { ...process.env, NO_COLOR: '1' },
        reject: false,
        stdin: 'ignore',
      }));
    } catch (error) {
      if (error instanceof Error && error.message.includes('ENOENT')) {
        throw new Error(this.installHint);
      }
      throw error;
    }

    debug(`${this.name}: stdout ${stdout.length} chars, stderr ${stderr.substring(0, 300) || '(none)'}`);

    const failure = stderr ? this.describeFailure(stderr, stdout) : null;
    if (failure) {
      throw new Error(failure);
    }

    return {
      output: stdout || '',
      error: stderr || undefined,
    };
  }
}

function debug(message: string): void {
  if (process.env.ARCHSCRY_DEBUG) {
    console.log(`[DEBUG] ${message}`);
  }
}
