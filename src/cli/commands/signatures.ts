import * as p from '@clack/prompts';
import chalk from 'chalk';
import { resolve } from 'path';
import { DecisionCategory, TechnologySignature } from '../../types.js';
import { loadConfig } from '../../core/config.js';
import { compileSignatures, loadSignatures } from '../../core/signatures.js';
import { describeError } from '../../core/errors.js';

export interface SignaturesOptions {
  category?: string;
  json?: boolean;
}

/**
 * List the merged signature registry. Loading and compiling it is also
 * the check that a project registry is valid.
 */
export async function signaturesCommand(path: string | undefined, options: SignaturesOptions): Promise<void> {
  const root = resolve(path ?? process.cwd());

  let signatures: TechnologySignature[];
  try {
    const config = loadConfig(root);
    signatures = loadSignatures(root, config.signatures);
    compileSignatures(signatures);
  } catch (error) {
    p.log.error(describeError(error));
    process.exit(1);
  }

  if (options.category !== undefined) {
    const category = DecisionCategory.safeParse(options.category);
    if (!category.success) {
      p.log.error(`Unknown category "${options.category}". Known: ${DecisionCategory.options.join(', ')}`);
      process.exit(1);
    }
    signatures = signatures.filter((s) => s.category === category.data);
  }

  if (options.json) {
    console.log(JSON.stringify(signatures, null, 2));
    return;
  }

  const byCategory = new Map<string, TechnologySignature[]>();
  for (const signature of signatures) {
    byCategory.set(signature.category, [...(byCategory.get(signature.category) ?? []), signature]);
  }

  console.log();
  for (const [category, entries] of [...byCategory.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    console.log(chalk.bold(category));
    for (const s of entries) {
      const version = s.currentMajor !== undefined ? chalk.dim(` (current major ${s.currentMajor})`) : '';
      console.log(`  ${chalk.cyan(s.id.padEnd(18))} ${s.name}${version}`);
    }
    console.log();
  }
  console.log(chalk.dim(`${signatures.length} signature(s)`));
}
