/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * treesweep run command - Dispatch a list of shell commands
 *
 * Reads one command per line from a file, or stdin when no file (or `-`) is
 * given, and runs them shuffled on a bounded pool.
 *
 * Usage:
 *   treesweep run commands.txt --jobs 40
 *   grep K100_ commands.txt | treesweep run --jobs 4 --halt now
 *   treesweep run commands.txt --grep mutrel --exclude K30_ --exclude K100_
 */

import * as fs from 'node:fs/promises';
import {
  BatchAbortedError,
  BatchFailedError,
  LocalTaskRunner,
  dispatchOrThrow,
  seededRandom,
  type BatchResult,
  type HaltPolicy,
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
} from '../utils.js';
import { buildShellTasks, filterShellTasks, parseCommandList } from './run.impl.js';

export interface RunOptions {
  jobs: string;
  halt: string;
  seed?: string;
  timeout?: string;
  grep: string[];
  exclude: string[];
  shuffle: boolean;
  eta?: boolean;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function printSummary(result: BatchResult): void {
  console.log('');
  console.log('Summary:');
  console.log(`  Succeeded:   ${result.succeeded}`);
  console.log(`  Failed:      ${result.failed}`);
  console.log(`  Not started: ${result.notStarted}`);
  console.log(`  Duration:    ${formatDuration(result.duration)}`);
}

/**
 * Dispatch every selected line of a command list.
 */
export async function runCommand(file: string | undefined, options: RunOptions): Promise<void> {
  let concurrency: number;
  let halt: HaltPolicy;
  let seed: number | undefined;
  let timeout: number | undefined;
  let text: string;
  try {
    concurrency = parseCountOption(options.jobs, 'jobs') ?? 4;
    halt = parseHaltOption(options.halt) ?? 'soon';
    seed = parseIntOption(options.seed, 'seed');
    timeout = parseCountOption(options.timeout, 'timeout');
    text = file === undefined || file === '-' ? await readStdin() : await fs.readFile(file, 'utf-8');
  } catch (err) {
    exitError(formatError(err));
  }

  const tasks = filterShellTasks(buildShellTasks(parseCommandList(text)), options.grep, options.exclude);
  const controller = abortOnSignals();
  try {
    const result = await dispatchOrThrow(
      { name: 'run', tasks, concurrency, halt },
      {
        runner: new LocalTaskRunner(),
        shuffle: options.shuffle,
        random: seed !== undefined ? seededRandom(seed) : undefined,
        signal: controller.signal,
        timeout,
        ...consoleReporter({ eta: options.eta }),
      }
    );
    printSummary(result);
  } catch (err) {
    if (err instanceof BatchFailedError || err instanceof BatchAbortedError) {
      printSummary(err.result);
    }
    exitPipelineError(err);
  }
}
