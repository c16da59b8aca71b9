import * as p from '@clack/prompts';
import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { ArchscryConfig, ProviderType } from '../../types.js';
import { CONFIG_DIR, getConfigPath, stringifyConfig } from '../../core/config.js';
import { createEmptyStore, resolveStorePath, saveStore } from '../../core/decision-store.js';
import { detectProvider } from '../../providers/detect.js';

export interface InitOptions {
  provider?: string;
  force?: boolean;
  // Non-interactive: keep defaults, pick the first available provider
  yes?: boolean;
}

export async function initCommand(path: string | undefined, options: InitOptions): Promise<void> {
  const root = resolve(path ?? process.cwd());
  const configDir = join(root, CONFIG_DIR);
  const configPath = getConfigPath(root);

  if (existsSync(configPath) && !options.force) {
    p.log.error('archscry is already initialized in this directory.');
    p.log.info('Use --force to overwrite the configuration. The decision store is never reset.');
    process.exit(1);
  }

  p.intro(chalk.cyan('archscry') + chalk.dim(' - initialization'));

  // ─────────────────────────────────────────────────────────────
  // Provider for narrative synthesis
  // ─────────────────────────────────────────────────────────────
  let provider: ProviderType;
  const requested = ProviderType.safeParse(options.provider);

  if (options.provider !== undefined && !requested.success) {
    p.log.error(`Unknown provider "${options.provider}". Supported: ${ProviderType.options.join(', ')}`);
    process.exit(1);
  }

  if (requested.success) {
    provider = requested.data;
  } else {
    const spinner = p.spinner();
    spinner.start('Detecting available LLM providers...');
    const detected = await detectProvider();
    spinner.stop(detected ? `Detected ${detected}` : 'No LLM provider detected');

    if (!detected) {
      p.log.info('Decision records will use template rationale until a provider is installed.');
    }

    if (options.yes) {
      provider = detected ?? 'claude-code';
    } else {
      const choice = await p.select({
        message: 'Which provider should write decision narratives?',
        options: ProviderType.options.map((value) => ({
          value,
          label: value,
          hint: value === detected ? 'detected' : undefined,
        })),
        initialValue: detected ?? 'claude-code',
      });

      if (p.isCancel(choice)) {
        p.cancel('Initialization cancelled.');
        process.exit(0);
      }

      const parsed = ProviderType.safeParse(choice);
      provider = parsed.success ? parsed.data : 'claude-code';
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Write config and an empty decision store
  // ─────────────────────────────────────────────────────────────
  const config: ArchscryConfig = ArchscryConfig.parse({ provider });

  mkdirSync(configDir, { recursive: true });
  writeFileSync(configPath, stringifyConfig(config));

  const storePath = resolveStorePath(root, config.store.path);
  if (!existsSync(storePath)) {
    saveStore(storePath, createEmptyStore());
  }

  p.log.success(`Wrote ${chalk.cyan(configPath)}`);
  p.log.info(`Decision store: ${chalk.cyan(storePath)}`);
  p.outro(chalk.green('Ready. Run "archscry analyze" to import the architecture.'));
}
