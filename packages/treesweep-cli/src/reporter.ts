/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Console reporting for pipeline callbacks.
 */

import type { PairwiseOptions } from '@treesweep/core';
import { formatBatchSummary, formatDuration, formatProgress, formatTaskLine } from './format.js';

/** Callbacks shared by every command */
export type ConsoleCallbacks = Pick<
  PairwiseOptions,
  | 'onDiagnostic'
  | 'onStageStart'
  | 'onStageComplete'
  | 'onStageSkipped'
  | 'onBatchStart'
  | 'onBatchComplete'
  | 'onTaskStart'
  | 'onTaskComplete'
  | 'onProgress'
  | 'onStdout'
  | 'onStderr'
>;

export interface ReporterOptions {
  /** Print a progress line with an ETA after every settled task */
  eta?: boolean;
}

/**
 * Callbacks printing batch, stage and task events.
 *
 * Enumeration diagnostics and progress go to stderr so stdout stays a log of
 * task events and pass-through task output.
 */
export function consoleReporter(options: ReporterOptions = {}): ConsoleCallbacks {
  return {
    onDiagnostic: (message) => {
      console.error(message);
    },
    onStageStart: (name) => {
      console.log(`Stage ${name}`);
    },
    onStageComplete: (name, duration) => {
      console.log(`Stage ${name} done [${formatDuration(duration)}]`);
      console.log('');
    },
    onStageSkipped: (name) => {
      console.log(`Stage ${name} skipped`);
    },
    onBatchStart: (batch) => {
      console.log(`Batch ${batch.name}: ${batch.tasks.length} task(s), concurrency ${batch.concurrency}`);
    },
    onBatchComplete: (result) => {
      console.log(formatBatchSummary(result));
    },
    onTaskStart: (task) => {
      console.log(`  [START] ${task.id}`);
    },
    onTaskComplete: (task, result) => {
      console.log(formatTaskLine(task, result));
    },
    onProgress: options.eta
      ? (snapshot) => {
          console.error(formatProgress(snapshot));
        }
      : undefined,
    onStdout: (_task, data) => {
      process.stdout.write(data);
    },
    onStderr: (_task, data) => {
      process.stderr.write(data);
    },
  };
}
