/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * treesweep CLI - fan analysis programs out over simulation runs
 *
 * Each pipeline command takes a JSON configuration file; `run` dispatches an
 * arbitrary list of shell commands.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { evaluateCommand } from './commands/evaluate.js';
import { pairwiseCommand } from './commands/pairwise.js';
import { runCommand } from './commands/run.js';
import { collect } from './utils.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

const program = new Command();

program
  .name('treesweep')
  .description('Fan analysis programs out over simulation runs on a bounded worker pool')
  .version(packageJson.version);

// Pipelines
program
  .command('evaluate <config>')
  .description('Compute mutphi, mutdist and mutrel for every run of every method')
  .option('-j, --jobs <n>', 'Concurrent tasks per batch (default: config.parallel)')
  .option('--large-jobs <n>', 'Concurrent tasks for large-run mutrel (default: config.largeParallel)')
  .option('--halt <policy>', 'On failure: never, soon or now (default: config.halt)')
  .option('--seed <n>', 'Seed for a reproducible task order')
  .option('--no-shuffle', 'Dispatch tasks in enumeration order')
  .option('--eta', 'Print progress and estimated time remaining')
  .option('--dry-run', 'Print the commands of every batch without running them')
  .action(evaluateCommand);

program
  .command('pairwise <config>')
  .description('Compute, plot and publish pairwise mutation relations')
  .option('-j, --jobs <n>', 'Concurrent tasks per batch (default: config.parallel)')
  .option('--stages <list>', 'Comma-separated stages to run (default: config.stages)')
  .option('--halt <policy>', 'On failure: never, soon or now (default: config.halt)')
  .option('--seed <n>', 'Seed for a reproducible task order')
  .option('--no-shuffle', 'Dispatch tasks in enumeration order')
  .option('--eta', 'Print progress and estimated time remaining')
  .option('--dry-run', 'Print what each stage would run without running it')
  .action(pairwiseCommand);

// Generic dispatch
program
  .command('run [file]')
  .description('Run shell commands, one per line, from a file or stdin')
  .option('-j, --jobs <n>', 'Concurrent tasks', '4')
  .option('--halt <policy>', 'On failure: never, soon or now', 'soon')
  .option('--grep <text>', 'Only run lines containing text (repeatable)', collect, [])
  .option('--exclude <text>', 'Skip lines containing text (repeatable)', collect, [])
  .option('--timeout <ms>', 'Kill a task after this many milliseconds')
  .option('--seed <n>', 'Seed for a reproducible task order')
  .option('--no-shuffle', 'Run lines in file order')
  .option('--eta', 'Print progress and estimated time remaining')
  .action(runCommand);

await program.parseAsync();
