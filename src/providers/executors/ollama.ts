/**
 * Ollama Executor
 *
 * Runs prompts against a local model. The model defaults to llama3.1 and
 * can be changed with ARCHSCRY_OLLAMA_MODEL.
 */

import { CliExecutor } from './cli-executor.js';

const DEFAULT_MODEL = 'llama3.1';

export class OllamaExecutor extends CliExecutor {
  readonly name = 'ollama';
  // Local models can be slow
  protected readonly defaultTimeoutMs = 600_000;
  protected readonly installHint = 'Ollama not found. Install from: https://ollama.com';

  constructor(private readonly model: string = process.env.ARCHSCRY_OLLAMA_MODEL || DEFAULT_MODEL) {
    super();
  }

  protected args(prompt: string): string[] {
    return ['run', this.model, prompt];
  }

  protected describeFailure(stderr: string, stdout: string): string | null {
    if (stderr.includes('connection refused') || stderr.includes('ECONNREFUSED')) {
      return 'Ollama server not running. Start it with: ollama serve';
    }
    if (stderr.includes('model') && (stderr.includes('not found') || stderr.includes('does not exist'))) {
      return `Ollama model '${this.model}' not found. Run: ollama pull ${this.model}`;
    }
    if ((stderr.includes('Error') || stderr.includes('error')) && !stdout) {
      return `Ollama error: ${stderr.substring(0, 200)}`;
    }
    return null;
  }
}
