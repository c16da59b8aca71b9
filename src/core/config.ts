import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import YAML from 'yaml';
import { ArchscryConfig } from '../types.js';
import { InputError } from './errors.js';
import { formatZodError } from './validation.js';

export const CONFIG_DIR = '.archscry';
export const CONFIG_FILENAME = 'config.yml';

export function getConfigPath(cwd: string): string {
  return join(cwd, CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Load .archscry/config.yml, falling back to defaults for anything not set.
 * A file that exists but does not validate is an input error.
 */
export function loadConfig(cwd: string): ArchscryConfig {
  const configPath = getConfigPath(cwd);

  if (!existsSync(configPath)) {
    return ArchscryConfig.parse({});
  }

  let raw: unknown;
  try {
    raw = YAML.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputError('invalid-config', `Failed to parse ${configPath}: ${message}`);
  }

  const result = ArchscryConfig.safeParse(raw ?? {});
  if (!result.success) {
    throw new InputError('invalid-config', `Invalid config in ${configPath}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export function defaultConfig(): ArchscryConfig {
  return ArchscryConfig.parse({});
}

export function stringifyConfig(config: ArchscryConfig): string {
  return YAML.stringify(config);
}
