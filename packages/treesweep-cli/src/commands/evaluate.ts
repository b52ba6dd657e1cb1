/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * treesweep evaluate command - Compute mutphi, mutdist and mutrel for every run
 *
 * Usage:
 *   treesweep evaluate eval.json
 *   treesweep evaluate eval.json --jobs 16 --large-jobs 2
 *   treesweep evaluate eval.json --dry-run
 */

import {
  EvaluationConfigSchema,
  LocalTaskRunner,
  enumerateEvaluation,
  formatCommandLine,
  loadConfig,
  planEvaluation,
  runEvaluation,
  type EvaluationConfig,
} from '@treesweep/core';
import { consoleReporter } from '../reporter.js';
import {
  abortOnSignals,
  exitError,
  exitPipelineError,
  formatError,
  parseCountOption,
  parseHaltOption,
  parseIntOption,
} from '../utils.js';

export interface EvaluateOptions {
  jobs?: string;
  largeJobs?: string;
  halt?: string;
  seed?: string;
  dryRun?: boolean;
  shuffle: boolean;
  eta?: boolean;
}

async function loadEvaluationConfig(configPath: string, options: EvaluateOptions): Promise<EvaluationConfig> {
  return loadConfig(configPath, EvaluationConfigSchema, {
    parallel: parseCountOption(options.jobs, 'jobs'),
    largeParallel: parseCountOption(options.largeJobs, 'large-jobs'),
    halt: parseHaltOption(options.halt),
    seed: parseIntOption(options.seed, 'seed'),
  });
}

/**
 * Print every batch's command lines without running anything.
 */
async function printPlan(config: EvaluationConfig): Promise<void> {
  const tasks = await enumerateEvaluation(config, {
    onDiagnostic: (message) => console.error(message),
  });
  for (const batch of planEvaluation(config, tasks)) {
    console.log(`# ${batch.name} (${batch.tasks.length} task(s), concurrency ${batch.concurrency})`);
    for (const task of batch.tasks) {
      console.log(formatCommandLine(task.command));
    }
  }
}

/**
 * Run the evaluation pipeline described by a configuration file.
 */
export async function evaluateCommand(configPath: string, options: EvaluateOptions): Promise<void> {
  let config: EvaluationConfig;
  try {
    config = await loadEvaluationConfig(configPath, options);
    if (options.dryRun) {
      await printPlan(config);
      return;
    }
  } catch (err) {
    exitError(formatError(err));
  }

  const controller = abortOnSignals();
  try {
    const result = await runEvaluation(config, {
      runner: new LocalTaskRunner({ threadEnv: config.threadEnv }),
      signal: controller.signal,
      shuffle: options.shuffle,
      ...consoleReporter({ eta: options.eta }),
    });

    const succeeded = result.batches.reduce((sum, batch) => sum + batch.succeeded, 0);
    console.log('');
    console.log('Summary:');
    console.log(`  Tasks:     ${result.tasks}`);
    console.log(`  Batches:   ${result.batches.length}`);
    console.log(`  Succeeded: ${succeeded}`);
  } catch (err) {
    exitPipelineError(err);
  }
}
