/**
 * Provider detection
 *
 * A provider is available when its CLI resolves on PATH. The command
 * can be overridden per provider through the environment, e.g.
 * ARCHSCRY_CLAUDE_CODE_COMMAND=/opt/bin/claude.
 */

import { execa } from 'execa';
import { ProviderType } from '../types.js';

const DEFAULT_COMMANDS: Record<ProviderType, string> = {
  'claude-code': 'claude',
  ollama: 'ollama',
};

export function getProviderCommand(provider: ProviderType): string {
  const override = process.env[`ARCHSCRY_${provider.toUpperCase().replace(/-/g, '_')}_COMMAND`];
  return override && override.trim() ? override.trim() : DEFAULT_COMMANDS[provider];
}

export async function isProviderAvailable(provider: ProviderType): Promise<boolean> {
  const command = getProviderCommand(provider);
  const lookup = process.platform === 'win32' ? 'where' : 'which';

  const result = await execa(lookup, [command], { reject: false, stdin: 'ignore' });
  return result.exitCode === 0;
}

/**
 * First installed provider, in preference order
 */
export async function detectProvider(): Promise<ProviderType | null> {
  for (const provider of ProviderType.options) {
    if (await isProviderAvailable(provider)) {
      return provider;
    }
  }
  return null;
}
