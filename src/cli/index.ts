#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { analyzeCommand } from './commands/analyze.js';
import { initCommand } from './commands/init.js';
import { statusCommand } from './commands/status.js';
import { signaturesCommand } from './commands/signatures.js';

const BANNER = `
${chalk.cyan('  ┌─┐┬─┐┌─┐┬ ┬┌─┐┌─┐┬─┐┬ ┬')}
${chalk.cyan('  ├─┤├┬┘│  ├─┤└─┐│  ├┬┘└┬┘')}
${chalk.cyan('  ┴ ┴┴└─└─┘┴ ┴└─┘└─┘┴└─ ┴ ')}

${chalk.dim('  Architecture, recovered from the code that already exists.')}
`;

const program = new Command();

program
  .name('archscry')
  .description('Reverse-engineer architectural decisions, diagrams, threat models and tech-debt reports from a codebase')
  .version('0.1.0')
  .hook('preAction', (_command, action) => {
    // Show banner only for interactive runs
    if (!action.opts().json && process.stdout.isTTY) {
      console.log(BANNER);
    }
  });

// ─────────────────────────────────────────────────────────────
// analyze - Run the full import pipeline
// ─────────────────────────────────────────────────────────────
program
  .command('analyze [path]')
  .description('Import architecture knowledge from a source tree')
  .option('--skip-threat-model', 'Do not run the threat modeler')
  .option('--skip-tech-debt', 'Do not run the debt detector')
  .option('--no-narrative', 'Use template rationale only, never call the LLM provider')
  .option('--tickets', 'File tickets for low-confidence decisions and critical threats')
  .option('-b, --branch <name>', 'Create a git branch before writing artifacts')
  .option('-o, --output <dir>', 'Output directory (default from config)')
  .option('-y, --yes', 'Accept a REVIEW verdict without asking')
  .option('--dry-run', 'Write artifacts but leave the decision store untouched')
  .option('--json', 'Print the run result as JSON')
  .action(analyzeCommand);

// ─────────────────────────────────────────────────────────────
// init - Write config and an empty decision store
// ─────────────────────────────────────────────────────────────
program
  .command('init [path]')
  .description('Create .archscry/config.yml and an empty decision store')
  .option('-p, --provider <provider>', 'LLM provider for narrative synthesis')
  .option('--force', 'Overwrite an existing configuration')
  .option('-y, --yes', 'Use defaults without asking')
  .action(initCommand);

// ─────────────────────────────────────────────────────────────
// status - Show the decision store and configuration
// ─────────────────────────────────────────────────────────────
program
  .command('status [path]')
  .description('Show stored decisions and configuration')
  .action(statusCommand);

// ─────────────────────────────────────────────────────────────
// signatures - List the technology signature registry
// ─────────────────────────────────────────────────────────────
program
  .command('signatures [path]')
  .description('List (and validate) the technology signatures in effect')
  .option('-c, --category <category>', 'Only show one category')
  .option('--json', 'Output as JSON')
  .action(signaturesCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(2);
});
