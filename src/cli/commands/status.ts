import * as p from '@clack/prompts';
import chalk from 'chalk';
import { existsSync, readFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import { getConfigPath, loadConfig } from '../../core/config.js';
import { DecisionStoreFile, countByCategory, loadStore, resolveStorePath } from '../../core/decision-store.js';
import { ArchscryConfig } from '../../types.js';
import { describeError } from '../../core/errors.js';
import { detectProvider } from '../../providers/detect.js';
import { renderStatusCard } from '../components/card.js';

/**
 * Get repository name from git or directory name
 */
function getRepoName(root: string): string {
  const gitConfigPath = join(root, '.git', 'config');
  if (existsSync(gitConfigPath)) {
    const config = readFileSync(gitConfigPath, 'utf-8');
    const match = config.match(/url\s*=\s*.*[/:]([^/]+?)(?:\.git)?$/m);
    if (match) return match[1];
  }
  return basename(root);
}

interface ProjectState {
  config: ArchscryConfig;
  store: DecisionStoreFile;
}

function loadProjectState(root: string): ProjectState {
  const config = loadConfig(root);
  return { config, store: loadStore(resolveStorePath(root, config.store.path)) };
}

export async function statusCommand(path: string | undefined): Promise<void> {
  const root = resolve(path ?? process.cwd());

  if (!existsSync(getConfigPath(root))) {
    p.log.warn('archscry is not initialized in this directory; showing defaults.');
  }

  let state: ProjectState;
  try {
    state = loadProjectState(root);
  } catch (error) {
    p.log.error(describeError(error));
    process.exit(1);
  }
  const { config, store } = state;

  console.log();
  console.log(chalk.cyan.bold('archscry') + chalk.dim(' status'));
  console.log();

  const lastUpdated = store.decisions.length > 0 ? new Date(store.updatedAt).toLocaleString() : undefined;
  console.log(renderStatusCard(getRepoName(root), config.provider, store.decisions.length, countByCategory(store), lastUpdated));
  console.log();

  const available = await detectProvider();

  console.log(chalk.dim('Configuration'));
  console.log(`  Provider:   ${config.provider}`);
  console.log(`  Available:  ${available ?? 'none'}`);
  console.log(`  Output:     ${config.output.dir}`);
  console.log(`  Store:      ${config.store.path}`);
  console.log(`  Thresholds: accept ${config.validation.acceptThreshold}, review ${config.validation.reviewThreshold}`);
  console.log();

  if (store.decisions.length > 0) {
    console.log(chalk.dim('Recent decisions'));
    for (const record of store.decisions.slice(-5)) {
      console.log(`  ${chalk.cyan(record.id)}  ${record.title} ${chalk.dim(`(${record.confidenceLevel})`)}`);
    }
    console.log();
    console.log(chalk.dim('Run "archscry analyze" to refresh the import'));
  } else {
    console.log(chalk.dim('Run "archscry analyze" to import the architecture'));
  }
  console.log();
}
