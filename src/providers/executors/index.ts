/**
 * Executor registry, keyed by configured provider
 */

import { PromptExecutor } from '../../core/narrative.js';
import { ProviderType } from '../../types.js';
import { ClaudeCodeExecutor } from './claude-code.js';
import { OllamaExecutor } from './ollama.js';

export function getExecutor(provider: ProviderType): PromptExecutor {
  switch (provider) {
    case 'claude-code':
      return new ClaudeCodeExecutor();
    case 'ollama':
      return new OllamaExecutor();
  }
}

export { ClaudeCodeExecutor, OllamaExecutor };
export { CliExecutor } from './cli-executor.js';
