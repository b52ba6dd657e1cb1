/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * treesweep pairwise command - Compute, plot and publish pairwise relations
 *
 * Usage:
 *   treesweep pairwise pairwise.json
 *   treesweep pairwise pairwise.json --stages plot,write-index
 *   treesweep pairwise pairwise.json --dry-run
 */

import {
  LocalTaskRunner,
  PairwiseConfigSchema,
  formatCommandLine,
  loadConfig,
  planPairwise,
  runPairwise,
  type PairwiseConfig,
} from '@treesweep/core';
import { formatDuration } from '../format.js';
import { consoleReporter } from '../reporter.js';
import {
  abortOnSignals,
  exitError,
  exitPipelineError,
  formatError,
  parseCountOption,
  parseHaltOption,
  parseIntOption,
  parseListOption,
} from '../utils.js';

export interface PairwiseCommandOptions {
  jobs?: string;
  stages?: string;
  halt?: string;
  seed?: string;
  dryRun?: boolean;
  shuffle: boolean;
  eta?: boolean;
}

/**
 * Print what each stage would run given the files currently on disk.
 */
async function printPlan(config: PairwiseConfig): Promise<void> {
  const plans = await planPairwise(config, {
    onDiagnostic: (message) => console.error(message),
  });
  for (const plan of plans) {
    if (!plan.enabled) {
      console.log(`# ${plan.stage} (disabled)`);
      continue;
    }
    console.log(`# ${plan.stage} (${plan.tasks.length} task(s))`);
    for (const task of plan.tasks) {
      console.log(formatCommandLine(task.command));
    }
  }
}

/**
 * Run the pairwise pipeline described by a configuration file.
 */
export async function pairwiseCommand(configPath: string, options: PairwiseCommandOptions): Promise<void> {
  let config: PairwiseConfig;
  try {
    config = await loadConfig(configPath, PairwiseConfigSchema, {
      parallel: parseCountOption(options.jobs, 'jobs'),
      stages: parseListOption(options.stages),
      halt: parseHaltOption(options.halt),
      seed: parseIntOption(options.seed, 'seed'),
    });
    if (options.dryRun) {
      await printPlan(config);
      return;
    }
  } catch (err) {
    exitError(formatError(err));
  }

  const controller = abortOnSignals();
  try {
    const result = await runPairwise(config, {
      runner: new LocalTaskRunner({ threadEnv: config.threadEnv }),
      signal: controller.signal,
      shuffle: options.shuffle,
      ...consoleReporter({ eta: options.eta }),
    });

    console.log('Summary:');
    for (const stage of result.stages) {
      const duration = stage.status === 'completed' ? ` [${formatDuration(stage.duration)}]` : '';
      console.log(`  ${stage.name.padEnd(18)}${stage.status}${duration}`);
    }
  } catch (err) {
    exitPipelineError(err);
  }
}
